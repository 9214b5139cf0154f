import { z } from 'zod';

const countSchema = z.number().int().nonnegative();

// Statusline producers send either a plain model string or a model object.
const modelSchema = z.union([
  z.string(),
  z.object({
    id: z.string().optional(),
    display_name: z.string().optional(),
  }),
]);

export const StatusPayloadSchema = z.object({
  session_id: z.string().min(1).optional(),
  cwd: z.string(),
  model: modelSchema.nullish(),
  permission_mode: z.string().nullish(),
  cost: z.object({
    total_cost_usd: z.number().nonnegative().finite().optional(),
    total_tokens: countSchema.optional(),
  }).nullish(),
  context_window: z.object({
    used_percentage: z.number().min(0).max(100).optional(),
  }).nullish(),
  lines: z.object({
    added: countSchema.optional(),
    removed: countSchema.optional(),
  }).nullish(),
});

export const LifecyclePayloadSchema = z.object({
  event: z.string().optional(),
  session_id: z.string().min(1),
  cwd: z.string(),
  timestamp: z.union([z.number().int(), z.string()]).nullish(),
  content: z.unknown().optional(),
});

export const PermissionContentSchema = z.object({
  tool_name: z.string().optional(),
  tool: z.string().optional(),
  tool_input: z.unknown().optional(),
  input: z.unknown().optional(),
  raw: z.string().optional(),
});

export const InputContentSchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  message: z.string().optional(),
  question: z.string().optional(),
  raw: z.string().optional(),
});

const QuestionsInputSchema = z.object({
  questions: z.array(z.object({ question: z.string() }).passthrough()).min(1),
});

const CommandInputSchema = z.object({
  command: z.string(),
});

export { QuestionsInputSchema, CommandInputSchema };

export type StatusPayload = z.infer<typeof StatusPayloadSchema>;
export type LifecyclePayload = z.infer<typeof LifecyclePayloadSchema>;
export type PermissionContent = z.infer<typeof PermissionContentSchema>;
export type InputContent = z.infer<typeof InputContentSchema>;
