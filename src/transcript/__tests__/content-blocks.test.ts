import { describe, it, expect } from 'vitest';
import {
  contentBlockToRaw,
  flattenToolResultContent,
  parseContent,
  parseContentBlock,
} from '../content-blocks.js';

describe('flattenToolResultContent', () => {
  it('passes strings through', () => {
    expect(flattenToolResultContent('ok')).toBe('ok');
  });

  it('joins the text parts of a block array', () => {
    const content = [
      { type: 'text', text: 'line one' },
      { type: 'image', source: {} },
      { type: 'text', text: 'line two' },
    ];
    expect(flattenToolResultContent(content)).toBe('line one\nline two');
  });

  it('returns null for a missing field', () => {
    expect(flattenToolResultContent(undefined)).toBeNull();
    expect(flattenToolResultContent(null)).toBeNull();
  });

  it('stringifies other values', () => {
    expect(flattenToolResultContent({ exitCode: 0 })).toBe('{"exitCode":0}');
  });
});

describe('parseContentBlock', () => {
  it('parses a tool_use block', () => {
    const block = parseContentBlock({
      type: 'tool_use',
      id: 'toolu_9',
      name: 'Bash',
      input: { command: 'ls' },
    });
    expect(block).toEqual({ type: 'tool_use', id: 'toolu_9', name: 'Bash', input: { command: 'ls' } });
  });

  it('wraps a non-object tool input and defaults a missing one', () => {
    expect(parseContentBlock({ type: 'tool_use', id: 't', name: 'X', input: 'raw' })).toEqual({
      type: 'tool_use',
      id: 't',
      name: 'X',
      input: { value: 'raw' },
    });
    expect(parseContentBlock({ type: 'tool_use', id: 't', name: 'X' })).toEqual({
      type: 'tool_use',
      id: 't',
      name: 'X',
      input: {},
    });
  });

  it('parses a tool_result block with its error flag', () => {
    const block = parseContentBlock({
      type: 'tool_result',
      tool_use_id: 'toolu_9',
      content: 'boom',
      is_error: true,
    });
    expect(block).toEqual({ type: 'tool_result', toolUseId: 'toolu_9', content: 'boom', isError: true });
  });

  it('keeps the thinking signature when present', () => {
    expect(parseContentBlock({ type: 'thinking', thinking: 'hmm', signature: 'sig' })).toEqual({
      type: 'thinking',
      thinking: 'hmm',
      signature: 'sig',
    });
  });

  it('turns an unrecognised type into an unknown block carrying the raw payload', () => {
    const raw = { type: 'server_tool_use', id: 'x', payload: [1, 2] };
    expect(parseContentBlock(raw)).toEqual({ type: 'unknown', rawType: 'server_tool_use', raw });
  });

  it('degrades a known type with the wrong shape to unknown', () => {
    const raw = { type: 'text', text: 42 };
    expect(parseContentBlock(raw)).toEqual({ type: 'unknown', rawType: 'text', raw });
  });

  it('records a null rawType when the block has no type', () => {
    expect(parseContentBlock({ text: 'orphan' })).toEqual({
      type: 'unknown',
      rawType: null,
      raw: { text: 'orphan' },
    });
  });
});

describe('parseContent', () => {
  it('wraps plain string content in one text block', () => {
    expect(parseContent('hello')).toEqual([{ type: 'text', text: 'hello' }]);
  });

  it('maps every element of an array', () => {
    const blocks = parseContent([
      { type: 'text', text: 'a' },
      { type: 'mystery' },
    ]);
    expect(blocks.map((b) => b.type)).toEqual(['text', 'unknown']);
  });
});

describe('contentBlockToRaw', () => {
  it('writes tool results back in wire format', () => {
    expect(
      contentBlockToRaw({ type: 'tool_result', toolUseId: 'toolu_1', content: 'out', isError: false }),
    ).toEqual({ type: 'tool_result', tool_use_id: 'toolu_1', content: 'out', is_error: false });
  });

  it('returns the raw payload of an unknown block', () => {
    const raw = { type: 'citation', url: 'https://example.test' };
    expect(contentBlockToRaw({ type: 'unknown', rawType: 'citation', raw })).toEqual(raw);
  });

  it('omits a null thinking signature', () => {
    expect(contentBlockToRaw({ type: 'thinking', thinking: 'plan', signature: null })).toEqual({
      type: 'thinking',
      thinking: 'plan',
    });
  });
});
