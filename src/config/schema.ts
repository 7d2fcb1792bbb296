import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);

// Matched as written, surrounding spaces included.
const policyText = z.string().refine((value) => value.trim().length > 0, { message: 'must not be blank' });

/** A bare string is a regular expression; the object forms make the kind explicit. */
export const titlePatternSchema = z.union([
  policyText,
  z.object({ regex: policyText }).strict(),
  z.object({ literal: policyText }).strict(),
]);

export const companySchema = z
  .object({
    name: nonEmpty,
    greenhouse_id: nonEmpty.nullish(),
    lever_id: nonEmpty.nullish(),
    careers_url: z.string().trim().url().nullish(),
  })
  .strict();

export const monitorConfigFileSchema = z
  .object({
    notification: z
      .object({
        email: z.string().trim().email().optional(),
        send_empty: z.boolean().default(false),
      })
      .strict()
      .default({}),
    companies: z.array(companySchema).default([]),
    title_patterns: z
      .object({
        high_priority: z.array(titlePatternSchema).default([]),
        medium_priority: z.array(titlePatternSchema).default([]),
      })
      .strict()
      .default({}),
    required_keywords: z.array(policyText).default([]),
    exclude_keywords: z.array(policyText).default([]),
    locations: z
      .object({
        preferred: z.array(policyText).default([]),
        exclude: z.array(policyText).default([]),
      })
      .strict()
      .default({}),
  })
  .strict();

export type TitlePatternInput = z.infer<typeof titlePatternSchema>;
export type CompanyEntry = z.infer<typeof companySchema>;
export type MonitorConfigFile = z.infer<typeof monitorConfigFileSchema>;
