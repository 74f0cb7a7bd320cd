/**
 * Stage graph and run status tests
 */

import { describe, it, expect } from 'vitest';
import { STAGE_NAMES, type RunStatus } from '../../../src/models/pipeline.js';
import { ConfigurationError, PipelineError } from '../../../src/pipeline/errors.js';
import { PIPELINE_GRAPH, StageGraph } from '../../../src/pipeline/graph.js';
import { describeStatus, INITIAL_STATUS, transition } from '../../../src/pipeline/status.js';

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH
// ═══════════════════════════════════════════════════════════════════════════════

describe('StageGraph', () => {
  it('orders the default pipeline', () => {
    expect(new StageGraph().executionOrder()).toEqual([
      'ocr',
      'dates',
      'classification',
      'vectorization',
      'versioning',
      'comparison',
      'legalization',
      'report',
    ]);
  });

  it('runs every stage exactly once', () => {
    const order = new StageGraph().executionOrder();
    expect([...order].sort()).toEqual([...STAGE_NAMES].sort());
  });

  it('places every stage after its predecessors', () => {
    const order = new StageGraph().executionOrder();
    for (const node of PIPELINE_GRAPH) {
      for (const dep of node.after) {
        expect(order.indexOf(dep)).toBeLessThan(order.indexOf(node.name));
      }
    }
  });

  it('uses declaration order among ready stages', () => {
    const graph = new StageGraph([
      { name: 'ocr', after: [] },
      { name: 'versioning', after: ['ocr'] },
      { name: 'dates', after: ['ocr'] },
    ]);
    expect(graph.executionOrder()).toEqual(['ocr', 'versioning', 'dates']);
  });

  it('rejects cycles, unknown predecessors and duplicates', () => {
    expect(
      () =>
        new StageGraph([
          { name: 'ocr', after: ['dates'] },
          { name: 'dates', after: ['ocr'] },
        ])
    ).toThrow('Stage graph has a cycle among: ocr, dates');
    expect(() => new StageGraph([{ name: 'dates', after: ['ocr'] }])).toThrow(ConfigurationError);
    expect(
      () =>
        new StageGraph([
          { name: 'ocr', after: [] },
          { name: 'ocr', after: [] },
        ])
    ).toThrow('Stage "ocr" declared twice');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// STATUS
// ═══════════════════════════════════════════════════════════════════════════════

describe('run status', () => {
  it('walks pending -> running -> completed', () => {
    let status: RunStatus = INITIAL_STATUS;
    status = transition(status, { type: 'start_stage', stage: 'ocr' });
    expect(status).toEqual({ state: 'running', stage: 'ocr' });
    status = transition(status, { type: 'start_stage', stage: 'dates' });
    expect(describeStatus(status)).toBe('running(dates)');
    status = transition(status, { type: 'complete' });
    expect(status).toEqual({ state: 'completed' });
  });

  it('records the running stage on failure', () => {
    const running = transition(INITIAL_STATUS, { type: 'start_stage', stage: 'versioning' });
    const failed = transition(running, { type: 'fail', reason: 'no date' });
    expect(failed).toEqual({ state: 'failed', stage: 'versioning', reason: 'no date' });
    expect(describeStatus(failed)).toBe('failed(versioning)');
  });

  it('rejects transitions that do not apply', () => {
    expect(() => transition(INITIAL_STATUS, { type: 'complete' })).toThrow(PipelineError);
    expect(() => transition({ state: 'completed' }, { type: 'start_stage', stage: 'ocr' })).toThrow(
      'Invalid run status transition: completed + start_stage'
    );
  });
});
