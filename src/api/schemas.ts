import { z } from "zod";

const IdentifierSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional()
});

export const ProjectResponseSchema = z.object({
  resource: z.object({
    identifier: IdentifierSchema,
    name: z.string()
  })
});

export const SampleSchema = z.object({
  identifier: IdentifierSchema,
  sampleName: z.string()
});

export const SampleListResponseSchema = z.object({
  resource: z.object({
    resources: z.array(SampleSchema).default([])
  })
});

export const CreatedSampleResponseSchema = z.object({
  resource: SampleSchema
});
