import { describe, it, expect } from 'vitest';
import { ProtocolError } from '@tessera/shared';
import { ToolCallAccumulator } from '../tool-call-accumulator.js';

describe('ToolCallAccumulator', () => {
  it('joins fragments per call id in arrival order', () => {
    const acc = new ToolCallAccumulator();
    acc.start('a', 'read_file');
    acc.start('b', 'system_info');
    acc.append('a', '{"pa');
    acc.append('b', '{}');
    acc.append('a', 'th":"/etc/hosts"}');

    expect(acc.finish()).toEqual([
      { id: 'a', name: 'read_file', arguments: '{"path":"/etc/hosts"}' },
      { id: 'b', name: 'system_info', arguments: '{}' },
    ]);
  });

  it('marks a call complete at its end marker', () => {
    const acc = new ToolCallAccumulator();
    acc.start('a', 'read_file');
    acc.end('a');

    expect(acc.isComplete('a')).toBe(true);
    expect(() => acc.append('a', 'late')).toThrow(ProtocolError);
  });

  it('rejects fragments for unknown calls', () => {
    expect(() => new ToolCallAccumulator().append('ghost', '{}')).toThrow(
      "argument fragment for unknown tool call 'ghost'",
    );
  });

  it('fills in a name that arrives after the first start', () => {
    const acc = new ToolCallAccumulator();
    acc.start('a', '');
    acc.start('a', 'read_file');

    expect(acc.finish()[0].name).toBe('read_file');
  });

  it('rejects a call that never got a name', () => {
    const acc = new ToolCallAccumulator();
    acc.start('a', '');

    expect(() => acc.finish()).toThrow("tool call 'a' has no name");
  });
});
