/**
 * Configuration Schema
 *
 * Zod schema for pagewatch.toml.
 */

import { z } from 'zod'

const BuildSectionSchema = z.object({
  command: z.string().min(1).optional(),
  'build-dir': z.string().min(1).default('book'),
  src: z.array(z.string().min(1)).default(['src']),
  ignore: z.array(z.string().min(1)).default([]),
})

const HtmlOutputSchema = z.object({
  'input-404': z.string().min(1).optional(),
  'site-url': z.string().min(1).optional(),
})

export const PagewatchConfigSchema = z.object({
  build: BuildSectionSchema.default({}),
  output: z
    .object({
      html: HtmlOutputSchema.default({}),
    })
    .default({}),
  language: z
    .object({
      default: z.string().min(1).optional(),
    })
    .default({}),
})

export type PagewatchConfig = z.infer<typeof PagewatchConfigSchema>
