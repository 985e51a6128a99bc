// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT REFERENCE DATA — Modes and Pricing Plans
// ═══════════════════════════════════════════════════════════════════════════════

import type { Mode, PricingPlan } from '../../api/schemas/index.js';

export const DEFAULT_MODES: readonly Mode[] = [
  {
    key: 'child',
    title: 'Child',
    description: 'Playful prompts for kids to imagine better worlds.',
    color: '#FDBA74',
  },
  {
    key: 'arts',
    title: 'Arts & Culture',
    description: 'Explore culture, identity and expression.',
    color: '#FDE68A',
  },
  {
    key: 'creative',
    title: 'Creative',
    description: 'Open-ended ideation and storytelling.',
    color: '#86EFAC',
  },
  {
    key: 'technology',
    title: 'Technology',
    description: 'Invent systems and tools for the future.',
    color: '#93C5FD',
  },
];

export const DEFAULT_PRICING_PLANS: readonly PricingPlan[] = [
  {
    name: 'Starter',
    price_month: 0,
    price_year: 0,
    features: ['Community play', 'Basic prompts', 'Public chat'],
  },
  {
    name: 'Creator',
    price_month: 4.99,
    price_year: 49.0,
    features: ['All modes', 'Saved worlds', 'Custom decks'],
  },
  {
    name: 'Team',
    price_month: 14.99,
    price_year: 149.0,
    features: ['Facilitator tools', 'Scoreboards', 'Workshop mode'],
  },
];

// Fresh copies, so callers may hand them to res.json or the store freely.
export function defaultModes(): Mode[] {
  return DEFAULT_MODES.map((mode) => ({ ...mode }));
}

export function defaultPricingPlans(): PricingPlan[] {
  return DEFAULT_PRICING_PLANS.map((plan) => ({ ...plan, features: [...plan.features] }));
}
