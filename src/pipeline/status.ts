/**
 * Run status state machine
 *
 *   pending -> running(stage) -> running(next) ... -> completed
 *                   |
 *                   +-> failed(stage, reason)
 *
 * Transitions are pure; an event that does not apply to the current state
 * throws instead of being ignored.
 *
 * @module pipeline/status
 */

import type { RunStatus, StageName } from '../models/pipeline.js';
import { PipelineError } from './errors.js';

export type StatusEvent =
  | { type: 'start_stage'; stage: StageName }
  | { type: 'complete' }
  | { type: 'fail'; reason: string };

export const INITIAL_STATUS: RunStatus = { state: 'pending' };

function invalid(status: RunStatus, event: StatusEvent): PipelineError {
  return new PipelineError(
    'INTERNAL_ERROR',
    `Invalid run status transition: ${describeStatus(status)} + ${event.type}`,
    { status, event }
  );
}

export function transition(status: RunStatus, event: StatusEvent): RunStatus {
  switch (status.state) {
    case 'pending':
      if (event.type === 'start_stage') return { state: 'running', stage: event.stage };
      throw invalid(status, event);

    case 'running':
      switch (event.type) {
        case 'start_stage':
          return { state: 'running', stage: event.stage };
        case 'complete':
          return { state: 'completed' };
        case 'fail':
          return { state: 'failed', stage: status.stage, reason: event.reason };
      }
      throw invalid(status, event);

    case 'completed':
    case 'failed':
      throw invalid(status, event);
  }
}

export function describeStatus(status: RunStatus): string {
  switch (status.state) {
    case 'pending':
    case 'completed':
      return status.state;
    case 'running':
      return `running(${status.stage})`;
    case 'failed':
      return `failed(${status.stage})`;
  }
}
