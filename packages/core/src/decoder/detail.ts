import {
  PermissionContentSchema,
  InputContentSchema,
  QuestionsInputSchema,
  CommandInputSchema,
  type PermissionContent,
} from './schema.js';

export const ASK_USER_QUESTION_TOOL = 'AskUserQuestion';

const RAW_PREVIEW_LENGTH = 100;

export interface EventDetail {
  toolName: string | null;
  message: string | null;
}

const EMPTY_DETAIL: EventDetail = { toolName: null, message: null };

function truncate(text: string): string {
  return text.length > RAW_PREVIEW_LENGTH ? `${text.slice(0, RAW_PREVIEW_LENGTH)}...` : text;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function firstQuestion(toolInput: unknown): string | null {
  const result = QuestionsInputSchema.safeParse(toolInput);
  return result.success ? result.data.questions[0].question : null;
}

function commandOf(toolInput: unknown): string | null {
  const result = CommandInputSchema.safeParse(toolInput);
  return result.success ? result.data.command : null;
}

function fromPermissionContent(content: PermissionContent): EventDetail | null {
  const toolName = content.tool_name ?? content.tool ?? null;
  const toolInput = content.tool_input ?? content.input;
  if (toolName === null && toolInput === undefined) return null;

  if (toolName === ASK_USER_QUESTION_TOOL) {
    return { toolName, message: firstQuestion(toolInput) };
  }
  return { toolName, message: commandOf(toolInput) };
}

/**
 * Extract the tool name and a one-line detail from a permission-request
 * payload's `content`. Hook scripts that fail to build JSON send the
 * original text under `raw`; it is parsed when possible, else previewed.
 */
export function extractPermissionDetail(content: unknown): EventDetail {
  const parsed = PermissionContentSchema.safeParse(content);
  if (!parsed.success) return EMPTY_DETAIL;

  const direct = fromPermissionContent(parsed.data);
  if (direct) return direct;

  const raw = parsed.data.raw;
  if (raw === undefined) return EMPTY_DETAIL;

  const rawContent = PermissionContentSchema.safeParse(parseJson(raw));
  if (rawContent.success) {
    return fromPermissionContent(rawContent.data) ?? EMPTY_DETAIL;
  }
  return { toolName: null, message: truncate(raw) };
}

/** Extract the prompt text from an input-required payload's `content`. */
export function extractInputMessage(content: unknown): string | null {
  const parsed = InputContentSchema.safeParse(content);
  if (!parsed.success) return null;

  const { message, title, raw } = parsed.data;
  if (message) return message;
  if (title) return title;
  if (raw === undefined) return null;

  const rawContent = InputContentSchema.safeParse(parseJson(raw));
  if (rawContent.success) {
    const { message: rawMessage, title: rawTitle, question } = rawContent.data;
    return rawMessage ?? rawTitle ?? question ?? null;
  }
  return truncate(raw);
}
