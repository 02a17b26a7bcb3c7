/**
 * Market Analyzer
 *
 * Area-level insights computed from the same counts the scorer sees:
 * maturity, growth potential, competition intensity, infrastructure quality,
 * demographics, economic activity, accessibility, gaps and risks.
 *
 * Never throws: a failed analysis returns FALLBACK_INSIGHTS.
 */

import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import {
  readCount,
  round,
  ownValue,
  type BusinessId,
  type FeatureTag,
  type IncomeLevel,
  type MarketContext,
} from '../contracts/site-decision.types.js';
import { estimateIncomeLevel, sanitizeOsmCounts, PEOPLE_PER_RESIDENTIAL_BUILDING } from '../engine/market-context.builder.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type CompetitionLevel = 'very_low' | 'low' | 'medium' | 'high';
export type QualityRating = 'excellent' | 'good' | 'fair' | 'poor';
export type EconomicLevel = 'strong' | 'moderate' | 'developing';
export const INFRASTRUCTURE_COMPONENTS = ['transport', 'healthcare', 'education', 'safety', 'recreation'] as const;
export type InfrastructureComponent = (typeof INFRASTRUCTURE_COMPONENTS)[number];
export type GapPriority = 'high' | 'medium';

export interface CompetitionIntensity {
  level: CompetitionLevel;
  score: number;
  totalBusinesses: number;
  dominantCategories: Array<{ businessId: BusinessId; count: number }>;
  /** Herfindahl-Hirschman index over category shares. */
  concentration: number;
  diversityIndex: number;
}

export interface InfrastructureQuality {
  overallScore: number;
  rating: QualityRating;
  components: Record<InfrastructureComponent, number>;
  strengths: InfrastructureComponent[];
  weaknesses: InfrastructureComponent[];
}

export interface DemographicProfile {
  estimatedPopulation: number;
  densityLevel: 'low' | 'medium' | 'high';
  incomeLevel: IncomeLevel;
  youngFamilies: number;
  workingAge: number;
}

export interface EconomicIndicators {
  level: EconomicLevel;
  score: number;
  commercialActivity: number;
  employmentHubs: number;
}

export interface Accessibility {
  overallScore: number;
  rating: QualityRating;
  transportScore: number;
  walkabilityScore: number;
}

export interface MarketGap {
  type: string;
  description: string;
  opportunity: BusinessId;
  priority: GapPriority;
}

export interface MarketRisk {
  type: string;
  level: 'high' | 'medium';
  description: string;
}

export interface MarketInsights {
  maturity: number;
  growthPotential: number;
  competition: CompetitionIntensity;
  infrastructure: InfrastructureQuality;
  demographics: DemographicProfile;
  economy: EconomicIndicators;
  accessibility: Accessibility;
  gaps: MarketGap[];
  risks: MarketRisk[];
  summary: string;
  recommendations: string[];
  fallback: boolean;
}

type Counts = Record<FeatureTag, number>;

// ═══════════════════════════════════════════════════════════════
// THRESHOLDS
// ═══════════════════════════════════════════════════════════════

const COMPETITION_THRESHOLDS = { low: 5, medium: 15, high: 30 } as const;
const POPULATION_THRESHOLDS = { medium: 1500, high: 3000 } as const;

const INFRASTRUCTURE: Record<InfrastructureComponent, { weight: number; items: Array<[FeatureTag, number]> }> = {
  transport: { weight: 0.3, items: [['bus_stop', 0.6], ['subway', 0.4]] },
  healthcare: { weight: 0.2, items: [['hospital', 0.7], ['pharmacy', 0.3]] },
  education: { weight: 0.2, items: [['school', 1]] },
  safety: { weight: 0.15, items: [['police', 1]] },
  recreation: { weight: 0.15, items: [['park', 1]] },
};

const GROWTH_INDICATORS: Array<[FeatureTag, number]> = [
  ['residential', 0.3],
  ['office', 0.3],
  ['subway', 0.2],
  ['hospital', 0.1],
  ['school', 0.1],
];

export const FALLBACK_INSIGHTS: MarketInsights = Object.freeze<MarketInsights>({
  maturity: 0.5,
  growthPotential: 0.5,
  competition: {
    level: 'medium',
    score: 0.5,
    totalBusinesses: 0,
    dominantCategories: [],
    concentration: 0,
    diversityIndex: 0,
  },
  infrastructure: {
    overallScore: 0.5,
    rating: 'fair',
    components: { transport: 0.5, healthcare: 0.5, education: 0.5, safety: 0.5, recreation: 0.5 },
    strengths: [],
    weaknesses: [],
  },
  demographics: { estimatedPopulation: 0, densityLevel: 'low', incomeLevel: 'medium', youngFamilies: 0, workingAge: 0 },
  economy: { level: 'moderate', score: 0.5, commercialActivity: 0, employmentHubs: 0 },
  accessibility: { overallScore: 0.5, rating: 'fair', transportScore: 0.5, walkabilityScore: 0.5 },
  gaps: [],
  risks: [],
  summary: 'Not enough data for a detailed market analysis',
  recommendations: ['Collect more market data for this area'],
  fallback: true,
});

function rate(score: number): QualityRating {
  if (score >= 0.8) return 'excellent';
  if (score >= 0.6) return 'good';
  if (score >= 0.4) return 'fair';
  return 'poor';
}

function totalBusinesses(categoryCounts: Record<BusinessId, number>): number {
  return Object.values(categoryCounts).reduce((acc, n) => acc + n, 0);
}

function categoryCount(ctx: MarketContext, id: BusinessId): number {
  return ownValue(ctx.categoryCounts, id) ?? 0;
}

// ═══════════════════════════════════════════════════════════════
// METRICS
// ═══════════════════════════════════════════════════════════════

export function marketMaturity(ctx: MarketContext): number {
  const density = Math.min(totalBusinesses(ctx.categoryCounts) / 50, 1);
  const infra = (['office', 'hospital', 'school'] as const).reduce((acc, tag) => acc + readCount(ctx, tag), 0);
  const infraMaturity = Math.min(infra / 20, 1);
  const diversity = Math.min(Object.keys(ctx.categoryCounts).length / 25, 1);
  return round(density * 0.4 + infraMaturity * 0.4 + diversity * 0.2, 3);
}

export function growthPotential(osm: Counts): number {
  let score = 0;
  for (const [tag, weight] of GROWTH_INDICATORS) score += Math.min(osm[tag] / 10, 1) * weight;
  if (osm.subway > 0) score *= 1.2;
  return round(Math.min(score, 1), 3);
}

export function competitionIntensity(categoryCounts: Record<BusinessId, number>): CompetitionIntensity {
  const total = totalBusinesses(categoryCounts);
  if (total === 0) {
    return { level: 'very_low', score: 0, totalBusinesses: 0, dominantCategories: [], concentration: 0, diversityIndex: 0 };
  }

  const entries = Object.entries(categoryCounts).filter(([, n]) => n > 0);
  const hhi = entries.reduce((acc, [, n]) => acc + (n / total) ** 2, 0);
  const dominant = [...entries]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 3)
    .map(([businessId, count]) => ({ businessId, count }));

  let level: CompetitionLevel = 'high';
  if (total < COMPETITION_THRESHOLDS.low) level = 'very_low';
  else if (total < COMPETITION_THRESHOLDS.medium) level = 'low';
  else if (total < COMPETITION_THRESHOLDS.high) level = 'medium';

  return {
    level,
    score: round(Math.min(total / COMPETITION_THRESHOLDS.high, 1), 3),
    totalBusinesses: total,
    dominantCategories: dominant,
    concentration: round(hhi, 4),
    diversityIndex: round(1 - hhi, 4),
  };
}

export function infrastructureQuality(osm: Counts): InfrastructureQuality {
  const components: Record<InfrastructureComponent, number> = {
    transport: 0,
    healthcare: 0,
    education: 0,
    safety: 0,
    recreation: 0,
  };
  let overall = 0;

  for (const name of INFRASTRUCTURE_COMPONENTS) {
    const spec = INFRASTRUCTURE[name];
    const value = spec.items.reduce((acc, [tag, w]) => acc + Math.min(osm[tag] / 5, 1) * w, 0);
    overall += value * spec.weight;
    components[name] = round(value, 3);
  }

  return {
    overallScore: round(overall, 3),
    rating: rate(overall),
    components,
    strengths: INFRASTRUCTURE_COMPONENTS.filter((n) => components[n] > 0.7),
    weaknesses: INFRASTRUCTURE_COMPONENTS.filter((n) => components[n] < 0.3),
  };
}

export function demographicProfile(osm: Counts): DemographicProfile {
  const population = osm.residential * PEOPLE_PER_RESIDENTIAL_BUILDING;
  const homes = Math.max(osm.residential, 1);
  let densityLevel: DemographicProfile['densityLevel'] = 'low';
  if (population >= POPULATION_THRESHOLDS.high) densityLevel = 'high';
  else if (population >= POPULATION_THRESHOLDS.medium) densityLevel = 'medium';

  return {
    estimatedPopulation: population,
    densityLevel,
    incomeLevel: estimateIncomeLevel(osm),
    youngFamilies: round(osm.school / homes, 3),
    workingAge: round(osm.office / homes, 3),
  };
}

export function economicIndicators(osm: Counts): EconomicIndicators {
  const commercialActivity = osm.office;
  const employmentHubs = osm.office + osm.hospital + osm.school;
  const score = Math.min((commercialActivity + employmentHubs) / 20, 1);
  let level: EconomicLevel = 'developing';
  if (score >= 0.7) level = 'strong';
  else if (score >= 0.4) level = 'moderate';
  return { level, score: round(score, 3), commercialActivity, employmentHubs };
}

export function accessibility(osm: Counts): Accessibility {
  const transportScore = Math.min((osm.bus_stop * 0.3 + osm.subway * 0.7) / 5, 1);
  const walkabilityScore = Math.min((osm.park + osm.school) / 5, 1);
  const overall = transportScore * 0.7 + walkabilityScore * 0.3;
  return {
    overallScore: round(overall, 3),
    rating: rate(overall),
    transportScore: round(transportScore, 3),
    walkabilityScore: round(walkabilityScore, 3),
  };
}

export function marketGaps(ctx: MarketContext): MarketGap[] {
  const gaps: MarketGap[] = [];
  const office = readCount(ctx, 'office');

  if (readCount(ctx, 'hospital') === 0) {
    gaps.push({ type: 'healthcare', description: 'No medical facilities nearby', opportunity: 'pharmacy', priority: 'high' });
  }
  if (readCount(ctx, 'school') > 2 && categoryCount(ctx, 'stationery') === 0) {
    gaps.push({
      type: 'education_support',
      description: 'Several schools but no stationery shop',
      opportunity: 'stationery',
      priority: 'medium',
    });
  }
  if (office > 3 && categoryCount(ctx, 'cafe') < 2) {
    gaps.push({ type: 'food_service', description: 'Office area short on cafes', opportunity: 'cafe', priority: 'high' });
  }
  if (office > 3 && categoryCount(ctx, 'laundry') === 0) {
    gaps.push({ type: 'convenience', description: 'Office workers lack laundry services', opportunity: 'laundry', priority: 'medium' });
  }
  if (readCount(ctx, 'residential') > 5 && categoryCount(ctx, 'grocery') === 0) {
    gaps.push({
      type: 'daily_needs',
      description: 'Residential area without a grocery store',
      opportunity: 'grocery',
      priority: 'high',
    });
  }
  return gaps;
}

export function marketRisks(ctx: MarketContext): MarketRisk[] {
  const risks: MarketRisk[] = [];
  if (totalBusinesses(ctx.categoryCounts) > COMPETITION_THRESHOLDS.high) {
    risks.push({ type: 'market_saturation', level: 'high', description: 'The market shows signs of saturation' });
  }
  if (readCount(ctx, 'police') === 0) {
    risks.push({ type: 'security', level: 'medium', description: 'No public security facilities nearby' });
  }
  if (readCount(ctx, 'hospital') === 0) {
    risks.push({ type: 'emergency_services', level: 'medium', description: 'No emergency medical facilities nearby' });
  }
  if (readCount(ctx, 'bus_stop') === 0 && readCount(ctx, 'subway') === 0) {
    risks.push({ type: 'accessibility', level: 'high', description: 'Poor public transport coverage' });
  }
  return risks;
}

export function marketSummary(maturity: number, growth: number, competition: CompetitionLevel): string {
  if (maturity > 0.7 && growth > 0.6) return 'Mature market with good growth potential';
  if (maturity > 0.5 && (competition === 'low' || competition === 'medium')) {
    return 'Stable market with moderate competition';
  }
  if (growth > 0.7) return 'Emerging market with high potential';
  if (maturity < 0.3) return 'Young market, proceed with caution';
  return 'Balanced market with mixed opportunities';
}

function marketRecommendations(
  infrastructure: InfrastructureQuality,
  competition: CompetitionIntensity,
  gaps: readonly MarketGap[],
  income: IncomeLevel,
): string[] {
  const out: string[] = [];
  if (infrastructure.overallScore < 0.4) out.push('Consider services that fill missing infrastructure');
  if (competition.level === 'low') out.push('Good time to enter: few competitors');
  else if (competition.level === 'high') out.push('A strong differentiation strategy is required');

  const urgent = gaps.filter((g) => g.priority === 'high').map((g) => g.opportunity);
  if (urgent.length) out.push(`Prioritize: ${urgent.join(', ')}`);

  if (income === 'high') out.push('Area suits premium services');
  else if (income === 'low') out.push('Focus on affordable, convenient services');
  return out;
}

// ═══════════════════════════════════════════════════════════════
// ANALYZER
// ═══════════════════════════════════════════════════════════════

export class MarketAnalyzer {
  constructor(private readonly logger: Logger = createLogger('market-analyzer')) {}

  analyze(ctx: MarketContext): MarketInsights {
    try {
      const osm = sanitizeOsmCounts(ctx.osmCounts);
      const maturity = marketMaturity(ctx);
      const growth = growthPotential(osm);
      const competition = competitionIntensity(ctx.categoryCounts);
      const infrastructure = infrastructureQuality(osm);
      const demographics = demographicProfile(osm);
      const gaps = marketGaps(ctx);

      return {
        maturity,
        growthPotential: growth,
        competition,
        infrastructure,
        demographics,
        economy: economicIndicators(osm),
        accessibility: accessibility(osm),
        gaps,
        risks: marketRisks(ctx),
        summary: marketSummary(maturity, growth, competition.level),
        recommendations: marketRecommendations(infrastructure, competition, gaps, demographics.incomeLevel),
        fallback: false,
      };
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, '[MarketAnalyzer] analysis failed, returning fallback');
      return FALLBACK_INSIGHTS;
    }
  }
}
