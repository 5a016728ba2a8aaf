/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// {media} (IIIF media path), {image} (image name), {album} (album id),
// {index} (1-based page index)
export const IMAGE_URL_PLACEHOLDERS = [
  "media",
  "image",
  "album",
  "index",
] as const;

export type ImageUrlPlaceholder = (typeof IMAGE_URL_PLACEHOLDERS)[number];

function usesKnownPlaceholders(template: string): boolean {
  const known: readonly string[] = IMAGE_URL_PLACEHOLDERS;
  return [...template.matchAll(/\{(\w+)\}/g)].every((m) =>
    known.includes(m[1]),
  );
}

// Zod schemas
export const ServiceConfigSchema = z.object({
  baseUrl: z.string().url(),
  imageUrlTemplate: z.string().refine(usesKnownPlaceholders, {
    message: `Only {${IMAGE_URL_PLACEHOLDERS.join("}, {")}} are allowed`,
  }),
});

export const HttpConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  userAgent: z.string(),
});

export const OutputConfigSchema = z.object({
  // null: derive the directory from the album title
  directory: z.string().nullable(),
  extension: z.string().regex(/^[a-z0-9]+$/i),
  padding: z.number().int().nonnegative(),
  overwrite: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const DownloaderConfigSchema = z.object({
  service: ServiceConfigSchema,
  http: HttpConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialDownloaderConfigSchema = DownloaderConfigSchema.partial()
  .extend({
    service: ServiceConfigSchema.partial().optional(),
    http: HttpConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type DownloaderConfig = z.infer<typeof DownloaderConfigSchema>;
export type PartialDownloaderConfig = z.infer<
  typeof PartialDownloaderConfigSchema
>;
export type LogLevel = LoggingConfig["level"];
