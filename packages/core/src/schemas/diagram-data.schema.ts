import { z } from 'zod';

export const BOUNDARY_TYPES = ['tenancy', 'container', 'network'] as const;
export const LEAF_TYPES = ['gateway', 'compute', 'storage', 'actor'] as const;

export const ComponentTypeSchema = z.enum([...BOUNDARY_TYPES, ...LEAF_TYPES]);

export const ComponentSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    type: ComponentTypeSchema,
    subtype: z.string().nullish(),
    parent_id: z.string().nullish(),
  })
  .loose();

export const FlowSchema = z
  .object({
    id: z.string().min(1),
    source_id: z.string().min(1),
    target_id: z.string().min(1),
    name: z.string().nullish(),
    protocol: z.string().nullish(),
    port: z.union([z.number(), z.string()]).nullish(),
    bidirectional: z.boolean().nullish(),
  })
  .loose();

/**
 * Components and flows extracted from an LLM response. Component ids are
 * unique, and every flow endpoint and every `parent_id` must name a component
 * in the same payload.
 */
export const DiagramDataSchema = z
  .object({
    components: z.array(ComponentSchema),
    flows: z.array(FlowSchema),
  })
  .loose()
  .superRefine((data, ctx) => {
    const ids = new Set<string>();
    data.components.forEach((component, index) => {
      if (ids.has(component.id)) {
        ctx.addIssue({
          code: 'custom',
          message: `duplicate component id: ${component.id}`,
          path: ['components', index, 'id'],
        });
      }
      ids.add(component.id);
    });
    data.components.forEach((component, index) => {
      if (component.parent_id && !ids.has(component.parent_id)) {
        ctx.addIssue({
          code: 'custom',
          message: `references non-existent parent: ${component.parent_id}`,
          path: ['components', index, 'parent_id'],
        });
      }
    });
    data.flows.forEach((flow, index) => {
      if (!ids.has(flow.source_id)) {
        ctx.addIssue({
          code: 'custom',
          message: `references non-existent source: ${flow.source_id}`,
          path: ['flows', index, 'source_id'],
        });
      }
      if (!ids.has(flow.target_id)) {
        ctx.addIssue({
          code: 'custom',
          message: `references non-existent target: ${flow.target_id}`,
          path: ['flows', index, 'target_id'],
        });
      }
    });
  });

export type ComponentType = z.infer<typeof ComponentTypeSchema>;
export type Component = z.infer<typeof ComponentSchema>;
export type Flow = z.infer<typeof FlowSchema>;
export type DiagramData = z.infer<typeof DiagramDataSchema>;
