export type PlanId = 'free' | 'starter' | 'professional' | 'enterprise';

export type Plan = {
  id: PlanId;
  name: string;
  rateLimitPerMinute: number;
  monthlyCharacters: number;
  premiumVoices: boolean;
};

export const PLANS: Record<PlanId, Plan> = {
  free: {
    id: 'free',
    name: 'Free',
    rateLimitPerMinute: 20,
    monthlyCharacters: 10_000,
    premiumVoices: false,
  },
  starter: {
    id: 'starter',
    name: 'Starter',
    rateLimitPerMinute: 60,
    monthlyCharacters: 100_000,
    premiumVoices: true,
  },
  professional: {
    id: 'professional',
    name: 'Professional',
    rateLimitPerMinute: 120,
    monthlyCharacters: 500_000,
    premiumVoices: true,
  },
  enterprise: {
    id: 'enterprise',
    name: 'Enterprise',
    rateLimitPerMinute: 300,
    monthlyCharacters: 2_000_000,
    premiumVoices: true,
  },
};

export function isPlanId(value: unknown): value is PlanId {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PLANS, value);
}
