/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

function isValidRegExp(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

// Zod schemas
export const CardClassSchema = z.enum(["cards", "heroes", "cardbacks"]);

export const CardTypeConfigSchema = z.object({
  // Regular expression matching the frame counter of an animation frame (e.g. "_\\d{4}$")
  frameRe: z
    .string()
    .min(1)
    .refine(isValidRegExp, "frameRe must be a valid regular expression"),
  // Name of the subfolder holding animation frames
  animFolder: z.string().min(1),
  // Output kinds to create, one directory each (e.g. "medium", "icons/small")
  outputs: z.array(z.string().min(1)),
  // Background image (file name inside the backgrounds folder) for composited animations
  composite: z.string().optional(),
  // Folder below the input root that holds this card class
  unityFolder: z.string(),
  // Crawl once per configured locale (<unityFolder>/<locale>) instead of once overall
  localized: z.boolean(),
});

export const CardTypesConfigSchema = z.object({
  cards: CardTypeConfigSchema,
  heroes: CardTypeConfigSchema,
  cardbacks: CardTypeConfigSchema,
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const CardConvertConfigSchema = z.object({
  cardTypes: CardTypesConfigSchema,
  locale: z.array(z.string().min(1)).min(1),
  processes: z.number().int().positive(),
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialCardConvertConfigSchema = CardConvertConfigSchema.partial()
  .extend({
    cardTypes: z
      .object({
        cards: CardTypeConfigSchema.partial().optional(),
        heroes: CardTypeConfigSchema.partial().optional(),
        cardbacks: CardTypeConfigSchema.partial().optional(),
      })
      .optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type CardClass = z.infer<typeof CardClassSchema>;
export type CardTypeConfig = z.infer<typeof CardTypeConfigSchema>;
export type CardTypesConfig = z.infer<typeof CardTypesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type CardConvertConfig = z.infer<typeof CardConvertConfigSchema>;
export type PartialCardConvertConfig = z.infer<
  typeof PartialCardConvertConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
