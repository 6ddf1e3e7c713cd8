import { z } from 'zod';

export const DFD_DIAGRAM_TYPE = 'DFD-1.0.0';

export const ThreatModelSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string().nullish(),
  })
  .loose();

export const TmiRepositorySchema = z
  .object({
    id: z.string().optional(),
    name: z.string().nullish(),
    uri: z.string(),
    type: z.string().nullish(),
  })
  .loose();

export const NoteSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    content: z.string().nullish(),
    description: z.string().nullish(),
  })
  .loose();

export const DiagramSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.string().optional(),
  })
  .loose();

/** Some list endpoints return a bare array, others wrap it. */
export function listOf<T extends z.ZodType>(item: T) {
  return z.union([
    z.array(item),
    z.object({ items: z.array(item) }).transform((page) => page.items),
  ]);
}

export const OAuthAuthorizeResponseSchema = z
  .object({
    authorization_url: z.url(),
  })
  .loose();

export type ThreatModel = z.infer<typeof ThreatModelSchema>;
export type TmiRepository = z.infer<typeof TmiRepositorySchema>;
export type Note = z.infer<typeof NoteSchema>;
export type Diagram = z.infer<typeof DiagramSchema>;

export interface NoteInput {
  name: string;
  content: string;
  description?: string;
}
