import type { RawContent, RawContentBlock } from './schema.js';
import type {
  ContentBlock,
  TextBlock,
  ThinkingBlock,
  ToolResultBlock,
  ToolUseBlock,
} from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(block: RawContentBlock, key: string): string | null {
  const value = block[key];
  return typeof value === 'string' ? value : null;
}

/**
 * Flatten a tool_result `content` field to text.
 * Strings pass through; block arrays contribute their text parts.
 */
export function flattenToolResultContent(content: unknown): string | null {
  if (content === undefined || content === null) return null;
  if (typeof content === 'string') return content;

  if (Array.isArray(content)) {
    return content
      .map((part: unknown) => {
        if (typeof part === 'string') return part;
        if (isRecord(part) && typeof part.text === 'string') return part.text;
        return null;
      })
      .filter((text): text is string => text !== null)
      .join('\n');
  }

  return JSON.stringify(content);
}

function unknownBlock(block: RawContentBlock): ContentBlock {
  return {
    type: 'unknown',
    rawType: typeof block.type === 'string' ? block.type : null,
    raw: { ...block },
  };
}

/**
 * Convert one raw block into the closed ContentBlock union.
 * A known `type` with the wrong shape degrades to `unknown` instead of failing.
 */
export function parseContentBlock(block: RawContentBlock): ContentBlock {
  switch (block.type) {
    case 'text': {
      const text = stringField(block, 'text');
      if (text === null) return unknownBlock(block);
      return { type: 'text', text };
    }
    case 'thinking': {
      const thinking = stringField(block, 'thinking');
      if (thinking === null) return unknownBlock(block);
      return { type: 'thinking', thinking, signature: stringField(block, 'signature') };
    }
    case 'tool_use': {
      const id = stringField(block, 'id');
      const name = stringField(block, 'name');
      if (id === null || name === null) return unknownBlock(block);
      const input = block.input;
      return {
        type: 'tool_use',
        id,
        name,
        input: isRecord(input) ? input : input === undefined ? {} : { value: input },
      };
    }
    case 'tool_result': {
      const toolUseId = stringField(block, 'tool_use_id');
      if (toolUseId === null) return unknownBlock(block);
      return {
        type: 'tool_result',
        toolUseId,
        content: flattenToolResultContent(block.content),
        isError: block.is_error === true,
      };
    }
    default:
      return unknownBlock(block);
  }
}

/**
 * Normalize a message `content` field. A plain string becomes one text block.
 */
export function parseContent(content: RawContent): ContentBlock[] {
  if (typeof content === 'string') {
    return [{ type: 'text', text: content }];
  }
  return content.map(parseContentBlock);
}

export function isTextBlock(block: ContentBlock): block is TextBlock {
  return block.type === 'text';
}

export function isThinkingBlock(block: ContentBlock): block is ThinkingBlock {
  return block.type === 'thinking';
}

export function isToolUseBlock(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

export function isToolResultBlock(block: ContentBlock): block is ToolResultBlock {
  return block.type === 'tool_result';
}

/**
 * Serialize a block back to the transcript's wire shape.
 */
export function contentBlockToRaw(block: ContentBlock): Record<string, unknown> {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'thinking':
      return block.signature === null
        ? { type: 'thinking', thinking: block.thinking }
        : { type: 'thinking', thinking: block.thinking, signature: block.signature };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.toolUseId,
        content: block.content,
        is_error: block.isError,
      };
    case 'unknown':
      return { ...block.raw };
  }
}
