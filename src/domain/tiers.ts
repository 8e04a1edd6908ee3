/**
 * Burn-in tiers, ordered from the slowest cycle to the fastest.
 * The last tier is terminal.
 */
export const TIER_SEQUENCE = ['24h', '12h', '6h', '3h', '2h'] as const;

export type Tier = (typeof TIER_SEQUENCE)[number];

export const TERMINAL_TIER: Tier = TIER_SEQUENCE[TIER_SEQUENCE.length - 1];

export interface TierTransition {
  from: Tier;
  to: Tier;
}

/** Requirement key as written in configuration, e.g. `24h_to_12h` */
export type TierRequirementKey = `${Tier}_to_${Tier}`;

export type TierRequirements = Partial<Record<TierRequirementKey, number>>;

export function isTier(value: unknown): value is Tier {
  return TIER_SEQUENCE.some((tier) => tier === value);
}

export function tierIndex(tier: Tier): number {
  return TIER_SEQUENCE.indexOf(tier);
}

export function isTerminalTier(tier: Tier): boolean {
  return tier === TERMINAL_TIER;
}

/**
 * Next tier in the sequence, or null for the terminal tier
 */
export function nextTier(tier: Tier): Tier | null {
  const index = tierIndex(tier);
  return index < TIER_SEQUENCE.length - 1 ? TIER_SEQUENCE[index + 1] : null;
}

export function transitionKey(transition: TierTransition): TierRequirementKey {
  return `${transition.from}_to_${transition.to}`;
}

/**
 * Transition out of `tier`, or null when `tier` is terminal
 */
export function advancementFrom(tier: Tier): TierTransition | null {
  const to = nextTier(tier);
  return to ? { from: tier, to } : null;
}

/** Every single-step transition of the sequence, in order */
export function allAdvancements(): TierTransition[] {
  return TIER_SEQUENCE.slice(0, -1).map((from, index) => ({
    from,
    to: TIER_SEQUENCE[index + 1],
  }));
}

export function formatTransition(transition: TierTransition): string {
  return `${transition.from} -> ${transition.to}`;
}
