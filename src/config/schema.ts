import { z } from "zod";
import { DEFAULT_ROOT_ELEMENT, ELEMENT_NAME_PATTERN } from "../convert/properties-to-xml";

const feedConfigSchema = z.object({
  baseUrl: z.string().url(),
  authToken: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(15000),
  userAgent: z.string().min(1).default("feedmap/1.0"),
});

export const appConfigSchema = z.object({
  feed: feedConfigSchema,
  xml: z
    .object({
      rootElement: z
        .string()
        .regex(ELEMENT_NAME_PATTERN, "must be an XML element name")
        .default(DEFAULT_ROOT_ELEMENT),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
