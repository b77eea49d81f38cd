import { z } from "zod";

const scalarText = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

/**
 * Optional string field; numbers are stringified and anything else is
 * dropped rather than failing the whole spec.
 */
const optionalText = scalarText.nullish().catch(undefined);

export const flowSpecNodeSchema = z
  .object({
    id: scalarText.pipe(z.string().min(1)),
    label: optionalText,
    type: optionalText,
    on_true: optionalText,
    on_false: optionalText,
  })
  .passthrough();

export const flowSpecEdgeSchema = z
  .object({
    source: optionalText,
    target: optionalText,
    label: optionalText,
  })
  .passthrough();

export const flowSpecSchema = z
  .object({
    nodes: z.array(flowSpecNodeSchema).min(1),
    edges: z.array(flowSpecEdgeSchema).default([]),
  })
  .passthrough()
  .refine((spec) => new Set(spec.nodes.map((node) => node.id)).size === spec.nodes.length, {
    message: "Flow spec node ids must be unique",
    path: ["nodes"],
  });

export type FlowSpec = z.infer<typeof flowSpecSchema>;
export type FlowSpecNode = z.infer<typeof flowSpecNodeSchema>;
export type FlowSpecEdge = z.infer<typeof flowSpecEdgeSchema>;
