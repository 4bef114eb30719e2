import { describe, expect, it } from 'vitest';
import { createLineSplitter } from '../src/display/host/lineSplitter';

describe('createLineSplitter', () => {
  it('emits complete lines and keeps the remainder for the next chunk', () => {
    const lines: string[] = [];
    const push = createLineSplitter(line => lines.push(line));

    push('{"id":1}\n{"id"');
    expect(lines).toEqual(['{"id":1}']);

    push(Buffer.from(':2}\n\n'));
    expect(lines).toEqual(['{"id":1}', '{"id":2}', '']);
  });

  it('waits while no newline has arrived', () => {
    const lines: string[] = [];
    const push = createLineSplitter(line => lines.push(line));
    push('partial');
    push(' line');
    expect(lines).toEqual([]);
    push('\n');
    expect(lines).toEqual(['partial line']);
  });
});
