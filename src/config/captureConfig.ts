import { z } from "zod";

export const CaptureConfigSchema = z.object({
  minPageWidth: z.number().int().positive().default(800),
  iconFloorPx: z.number().int().nonnegative().default(100),
  stabilizationTimeoutMs: z.number().int().nonnegative().default(20000),
  pollIntervalMs: z.number().int().nonnegative().default(1000),
  navMaxAttempts: z.number().int().positive().default(2),
  navSettleMs: z.number().int().nonnegative().default(4000),
  idleTimeoutMs: z.number().int().nonnegative().default(15000),
  loadStateTimeoutMs: z.number().int().nonnegative().default(5000),
  nextKey: z.string().min(1).default("ArrowRight")
});

export type CaptureConfig = z.infer<typeof CaptureConfigSchema>;
export type CaptureConfigInput = z.input<typeof CaptureConfigSchema>;

export function resolveCaptureConfig(overrides: CaptureConfigInput = {}): CaptureConfig {
  return CaptureConfigSchema.parse(overrides);
}
