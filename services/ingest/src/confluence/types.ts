import { z } from "zod";

const LabelSchema = z.object({ name: z.string(), prefix: z.string().optional() });

const LabelsSchema = z.object({
  labels: z.object({ results: z.array(LabelSchema) }).optional(),
});

const BodySchema = z.object({ value: z.string(), representation: z.string().optional() });

/** Subset of a Confluence REST v1 content object, with the expansions the client requests. */
export const ConfluencePageSchema = z.object({
  id: z.coerce.string(),
  type: z.string().optional(),
  status: z.string().optional(),
  title: z.string(),
  space: z.object({ key: z.string(), name: z.string().optional() }).optional(),
  body: z
    .object({
      view: BodySchema.optional(),
      storage: BodySchema.optional(),
    })
    .optional(),
  version: z
    .object({
      number: z.number(),
      when: z.string().optional(),
      by: z.object({ displayName: z.string().optional() }).optional(),
    })
    .optional(),
  ancestors: z.array(z.object({ id: z.coerce.string(), title: z.string() })).optional(),
  metadata: LabelsSchema.optional(),
  _links: z.object({ webui: z.string().optional(), self: z.string().optional() }).optional(),
});

export const ConfluenceContentListSchema = z.object({
  results: z.array(
    z.object({
      id: z.coerce.string(),
      title: z.string().optional(),
      metadata: LabelsSchema.optional(),
    }),
  ),
  start: z.number().optional(),
  limit: z.number().optional(),
  size: z.number().optional(),
});

export type ConfluencePage = z.infer<typeof ConfluencePageSchema>;
export type ConfluenceContentList = z.infer<typeof ConfluenceContentListSchema>;

export interface LabelFilter {
  includeLabels?: readonly string[];
  excludeLabels?: readonly string[];
}
