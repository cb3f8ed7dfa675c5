import vm from 'vm';
import {
  flowStreamId,
  normalizeLimit,
  readFlowRuns,
  readToolRuns,
  summarizeResult,
  toJsonSafe,
  toJsonSafeRecord,
  toolStreamId,
  type ToolRunEntry,
} from '../../../src/domain/audit/entries';
import type { AuditLogPort } from '../../../src/ports/sys/AuditLogPort';
import { ValidationError } from '../../../src/shared/errors';

function toolEntry(runId: string): ToolRunEntry {
  return {
    runId,
    toolName: 'add',
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:00:00.005Z',
    durationMs: 5,
    params: { a: 1, b: 2 },
    status: 'success',
    error: null,
    resultSummary: '3',
  };
}

describe('audit entries', () => {
  test('stream ids', () => {
    expect(toolStreamId('add')).toBe('add');
    expect(flowStreamId('math')).toBe('flow_math');
  });

  test('toJsonSafe snapshots values that JSON cannot hold', () => {
    const circular: Record<string, unknown> = { a: 1 };
    circular.self = circular;
    expect(toJsonSafe(undefined)).toBeNull();
    expect(toJsonSafe(Number.NaN)).toBe('NaN');
    expect(toJsonSafe(BigInt(10))).toBe('10');
    expect(toJsonSafe(new Date('2024-01-01T00:00:00Z'))).toBe('2024-01-01T00:00:00.000Z');
    expect(toJsonSafe(new Set([1, 2]))).toEqual([1, 2]);
    expect(toJsonSafe(new Map([['k', 'v']]))).toEqual({ k: 'v' });
    expect(toJsonSafe(circular)).toEqual({ a: 1, self: '[Circular]' });
    expect(toJsonSafeRecord({ when: new Date(0), list: [1, undefined] })).toEqual({
      when: '1970-01-01T00:00:00.000Z',
      list: [1, null],
    });
  });

  test('toJsonSafe reads dates, maps and sets made in another realm', () => {
    const foreign: unknown = vm.runInNewContext(
      '({ when: new Date(0), counts: new Map([["k", 1]]), tags: new Set(["x"]) })'
    );
    expect(toJsonSafe(foreign)).toEqual({
      when: '1970-01-01T00:00:00.000Z',
      counts: { k: 1 },
      tags: ['x'],
    });
  });

  test('toJsonSafe keeps shared references that are not cycles', () => {
    const shared = { v: 1 };
    expect(toJsonSafe({ a: shared, b: shared })).toEqual({ a: { v: 1 }, b: { v: 1 } });
  });

  test('summarizeResult caps the summary at 200 characters', () => {
    expect(summarizeResult(null)).toBeNull();
    expect(summarizeResult(undefined)).toBeNull();
    expect(summarizeResult(7)).toBe('7');
    expect(summarizeResult('hi')).toBe("'hi'");
    expect(summarizeResult({ a: 1 })).toBe('{ a: 1 }');

    const long = summarizeResult('x'.repeat(500));
    expect(long).toHaveLength(200);
    expect(long?.endsWith('...')).toBe(true);
  });

  test('readToolRuns drops entries that do not match the schema', () => {
    const log: AuditLogPort = {
      append: jest.fn(),
      tail: jest.fn(() => [toolEntry('r2'), { runId: 'broken' }, toolEntry('r1')]),
    };
    expect(readToolRuns(log, 'add', 3).map((entry) => entry.runId)).toEqual(['r2', 'r1']);
    expect(log.tail).toHaveBeenCalledWith('add');
  });

  test('the limit counts only entries that match the schema', () => {
    const log: AuditLogPort = {
      append: jest.fn(),
      tail: jest.fn(() => [{ runId: 'broken' }, { note: 'stray' }, toolEntry('r3'), toolEntry('r2'), toolEntry('r1')]),
    };
    expect(readToolRuns(log, 'add', 2).map((entry) => entry.runId)).toEqual(['r3', 'r2']);
  });

  test('readFlowRuns reads the flow stream', () => {
    const entry = {
      flowRunId: 'f1',
      flowName: 'math',
      stepId: null,
      tool: null,
      params: {},
      startedAt: '2024-01-01T00:00:00.000Z',
      finishedAt: '2024-01-01T00:00:00.010Z',
      durationMs: 10,
      status: 'success',
      error: null,
      resultSummary: '5',
    };
    const log: AuditLogPort = { append: jest.fn(), tail: jest.fn(() => [entry]) };
    expect(readFlowRuns(log, 'math')).toEqual([entry]);
    expect(log.tail).toHaveBeenCalledWith('flow_math');
  });

  test('normalizeLimit accepts positive integers or nothing', () => {
    expect(normalizeLimit(undefined)).toBeUndefined();
    expect(normalizeLimit(3)).toBe(3);
    for (const bad of [0, -1, 1.5, Number.NaN]) {
      expect(() => normalizeLimit(bad)).toThrow(ValidationError);
    }
  });
});
