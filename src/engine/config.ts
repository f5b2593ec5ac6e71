import { z } from 'zod';

/**
 * Stand-ins for game context a single snapshot cannot show (round history,
 * discards left, deck contents) and expected values for chance-based effects.
 * These are approximations, not tuned measurements; override them per run.
 */
export const ApproximationsSchema = z.object({
  luckyOdds: z.number().positive().default(5),
  luckyMult: z.number().nonnegative().default(20),
  bloodstoneOdds: z.number().positive().default(2),
  bloodstoneXMult: z.number().positive().default(1.5),
  greenJokerMult: z.number().default(3),
  blueJokerChips: z.number().default(60),
  redCardMult: z.number().default(3),
  swashbucklerMult: z.number().default(8),
  misprintMult: z.number().default(12),
  bannerChipsPerDiscard: z.number().default(30),
  assumedDiscardsLeft: z.number().int().nonnegative().default(1),
  mysticSummitMult: z.number().default(8),
  loyaltyXMult: z.number().positive().default(1.2),
  rideTheBusMult: z.number().default(3),
  supernovaMult: z.number().default(3),
  hikerChips: z.number().default(15)
});

export const EngineConfigSchema = z.object({
  maxPlaySize: z.number().int().positive().default(5),
  maxHandCards: z.number().int().positive().max(24).default(16),
  topN: z.number().int().nonnegative().default(3),
  jokerSlots: z.number().int().nonnegative().default(5),
  verbose: z.boolean().default(false),
  approximations: ApproximationsSchema.default({})
});

export type Approximations = z.infer<typeof ApproximationsSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

export function resolveConfig(overrides: EngineConfigInput = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(overrides);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid engine config: ${detail}`, result.error.issues);
  }
  return result.data;
}
