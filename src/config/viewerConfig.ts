import { z } from "zod";

const ViewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive()
});

export const ViewerConfigSchema = z.object({
  version: z.string(),
  start_url: z.string().url(),
  viewport: ViewportSchema.default({ width: 1920, height: 1080 }),
  login: z.object({
    link_selector: z.string().min(1).nullable(),
    username_selector: z.string().min(1),
    password_selector: z.string().min(1)
  }),
  paper_selector: z.string().min(1),
  pre_capture_selectors: z.array(z.string().min(1)).default([]),
  pre_capture_settle_ms: z.number().int().nonnegative().default(4000),
  root_selector: z.string().min(1).default("#app"),
  next_page_selector: z.string().min(1)
});

export type ViewerConfig = z.infer<typeof ViewerConfigSchema>;
