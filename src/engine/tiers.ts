import type { MappedTier, MappedTierName, Tier, UnmappedTier } from './types.js';

const TIER_NAMES: Record<string, MappedTierName> = {
  ES: 'Elite Series',
  ESP: 'Elite Series Plus',
  M: 'Major',
};

const TIER_SCORING = {
  'Elite Series': { multiplier: 1.0, label: 'Elite' },
  'Elite Series Plus': { multiplier: 1.5, label: 'Elite' },
  Major: { multiplier: 2.0, label: 'Major' },
} satisfies Record<MappedTierName, { multiplier: number; label: string }>;

export const UNMAPPED_TIER_NAME = 'Unmapped';

export const classifyTier = (abbreviation: string): Tier => {
  const normalized = abbreviation.trim().toUpperCase();
  const name = Object.hasOwn(TIER_NAMES, normalized) ? TIER_NAMES[normalized] : undefined;
  if (!name) {
    const unmapped: UnmappedTier = {
      kind: 'unmapped',
      abbreviation: normalized,
      name: UNMAPPED_TIER_NAME,
      multiplier: 1,
      label: UNMAPPED_TIER_NAME,
    };
    return unmapped;
  }

  const scoring = TIER_SCORING[name];
  const tier: MappedTier = {
    kind: 'mapped',
    abbreviation: normalized,
    name,
    multiplier: scoring.multiplier,
    label: scoring.label,
  };
  return tier;
};

export const isUnmappedTier = (tier: Tier): tier is UnmappedTier => tier.kind === 'unmapped';
