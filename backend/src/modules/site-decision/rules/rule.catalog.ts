/**
 * Rule catalog
 *
 * General rules apply to every business; business-specific rules are keyed by
 * business id; contextual rules select their businesses through `business_in`.
 */

import type { RuleCatalog, RuleDefinition } from './rule.types.js';

export const SATURATION_THRESHOLDS: Readonly<Record<string, number>> = {
  milk_tea: 6,
  cafe: 8,
  pharmacy: 3,
  spa: 4,
  gaming: 2,
  fast_food: 10,
};

// ═══════════════════════════════════════════════════════════════
// GENERAL
// ═══════════════════════════════════════════════════════════════

const GENERAL_RULES: RuleDefinition[] = [
  {
    id: 'market_oversaturated',
    name: 'Market oversaturated',
    category: 'market',
    severity: 'critical',
    priority: 9,
    predicate: { name: 'competitors_at_least', thresholds: SATURATION_THRESHOLDS, defaultThreshold: 5 },
    message: 'The market is already saturated with this type of business',
    recommendation: 'Consider a related business or another area',
    evidence: ['competitors'],
  },
  {
    id: 'high_competition',
    name: 'High competition',
    category: 'market',
    severity: 'warning',
    priority: 7,
    predicate: { name: 'score_below', factor: 'competition', threshold: 0.4 },
    message: 'Competition in the area is high',
    recommendation: 'A strong differentiation strategy is needed',
    evidence: ['competitors'],
  },
  {
    id: 'low_profit_potential',
    name: 'Low profit potential',
    category: 'financial',
    severity: 'warning',
    priority: 8,
    predicate: { name: 'score_below', factor: 'financial_viability', threshold: 0.3 },
    message: 'Profit potential is low',
    recommendation: 'Look for a lower-cost business model',
  },
  {
    id: 'high_rent_area',
    name: 'High rent area',
    category: 'financial',
    severity: 'warning',
    priority: 6,
    predicate: { name: 'feature_sum_above', terms: { office: 1, subway: 2 }, threshold: 15 },
    message: 'Commercial rents in the area are high',
    recommendation: 'Consider an online model or a different location',
  },
  {
    id: 'poor_safety',
    name: 'Poor safety infrastructure',
    category: 'operational',
    severity: 'warning',
    priority: 5,
    predicate: { name: 'feature_sum_at_most', terms: { police: 1, hospital: 1 }, threshold: 0 },
    message: 'Safety infrastructure is weak',
    recommendation: 'Invest in security or pick another location',
    evidence: ['safety'],
  },
  {
    id: 'poor_transport',
    name: 'Poor transport',
    category: 'operational',
    severity: 'info',
    priority: 4,
    predicate: { name: 'score_below', factor: 'transport', threshold: 0.3 },
    message: 'Public transport access is poor',
    recommendation: 'Consider delivery or online marketing',
    evidence: ['transport'],
  },
  {
    id: 'declining_market',
    name: 'Declining market',
    category: 'strategic',
    severity: 'warning',
    priority: 7,
    predicate: { name: 'score_below', factor: 'market_potential', threshold: 0.3 },
    message: 'The market shows signs of decline',
    recommendation: 'Research long-term trends before committing',
  },
  {
    id: 'customer_mismatch',
    name: 'Customer mismatch',
    category: 'strategic',
    severity: 'warning',
    priority: 8,
    predicate: { name: 'score_below', factor: 'customer', threshold: 0.4 },
    message: 'The business does not suit the target customers',
    recommendation: 'Change the target segment or choose another business',
  },
];

// ═══════════════════════════════════════════════════════════════
// BUSINESS-SPECIFIC
// ═══════════════════════════════════════════════════════════════

const BUSINESS_RULES: Record<string, RuleDefinition[]> = {
  cafe: [
    {
      id: 'cafe_no_office_nearby',
      name: 'Few offices nearby',
      category: 'market',
      severity: 'warning',
      priority: 6,
      predicate: { name: 'feature_below', tag: 'office', threshold: 2 },
      message: 'There are few office buildings nearby',
      recommendation: 'Focus on students or residents',
    },
    {
      id: 'cafe_too_many_competitors',
      name: 'Too many cafes',
      category: 'market',
      severity: 'critical',
      priority: 9,
      predicate: { name: 'category_count_above', category: 'cafe', threshold: 5 },
      message: 'Too many cafes within the radius',
      recommendation: 'Choose another site or a clearly different concept',
      evidence: ['competitors'],
    },
  ],
  milk_tea: [
    {
      id: 'milk_tea_no_students',
      name: 'No schools nearby',
      category: 'market',
      severity: 'warning',
      priority: 7,
      predicate: { name: 'feature_below', tag: 'school', threshold: 1 },
      message: 'There are no schools nearby',
      recommendation: 'Target another customer group or move',
    },
    {
      id: 'milk_tea_oversaturated',
      name: 'Milk tea oversaturated',
      category: 'market',
      severity: 'blocking',
      priority: 10,
      predicate: { name: 'category_count_above', category: 'milk_tea', threshold: 8 },
      message: 'The milk tea market here is oversaturated',
      recommendation: 'Do not open another one: pick a different business',
      evidence: ['competitors'],
    },
  ],
  pharmacy: [
    {
      id: 'pharmacy_hospital_required',
      name: 'Hospital required',
      category: 'legal',
      severity: 'critical',
      priority: 9,
      predicate: { name: 'feature_below', tag: 'hospital', threshold: 1 },
      message: 'A pharmacy needs a hospital or clinic nearby',
      recommendation: 'Find a site close to a hospital or clinic',
    },
    {
      id: 'pharmacy_license_complex',
      name: 'Complex licensing',
      category: 'legal',
      severity: 'info',
      priority: 8,
      predicate: { name: 'always' },
      message: 'Pharmacies are subject to complex regulation',
      recommendation: 'Prepare licences and certified staff in advance',
    },
  ],
  spa: [
    {
      id: 'spa_high_income_area',
      name: 'Needs a high-income area',
      category: 'market',
      severity: 'warning',
      priority: 7,
      predicate: { name: 'income_is', level: 'low' },
      message: 'A spa needs an area with higher incomes',
      recommendation: 'Find another area or adjust the price level',
    },
    {
      id: 'spa_parking_needed',
      name: 'Parking needed',
      category: 'operational',
      severity: 'info',
      priority: 5,
      predicate: { name: 'always' },
      message: 'Spa customers usually need parking',
      recommendation: 'Secure parking or a site near a car park',
    },
  ],
  gaming: [
    {
      id: 'gaming_student_area',
      name: 'Needs a student area',
      category: 'market',
      severity: 'critical',
      priority: 8,
      predicate: { name: 'student_ratio_below', threshold: 0.3 },
      message: 'A gaming lounge needs many students nearby',
      recommendation: 'Look near schools or young residential areas',
    },
    {
      id: 'gaming_noise_regulations',
      name: 'Noise regulations',
      category: 'legal',
      severity: 'warning',
      priority: 6,
      predicate: { name: 'feature_above', tag: 'residential', threshold: 10 },
      message: 'Dense housing nearby may raise noise complaints',
      recommendation: 'Check local rules and invest in soundproofing',
    },
  ],
};

// ═══════════════════════════════════════════════════════════════
// CONTEXTUAL
// ═══════════════════════════════════════════════════════════════

const CONTEXTUAL_RULES: RuleDefinition[] = [
  {
    id: 'pandemic_impact_assessment',
    name: 'Pandemic exposure',
    category: 'strategic',
    severity: 'info',
    priority: 6,
    predicate: { name: 'business_in', businesses: ['spa', 'gaming', 'nail', 'barbershop', 'tattoo'] },
    message: 'This business is exposed to epidemic restrictions',
    recommendation: 'Prepare a contingency plan for closures',
  },
  {
    id: 'seasonal_business',
    name: 'Seasonal business',
    category: 'strategic',
    severity: 'info',
    priority: 4,
    predicate: { name: 'business_in', businesses: ['ice_cream', 'flower_shop', 'toy_store'] },
    message: 'Demand for this business is strongly seasonal',
    recommendation: 'Plan for high and low seasons',
  },
  {
    id: 'digital_transformation',
    name: 'Digital transformation',
    category: 'strategic',
    severity: 'info',
    priority: 5,
    predicate: { name: 'business_in', businesses: ['bookstore', 'electronics', 'clothing', 'pharmacy'] },
    message: 'This business needs a strong online presence',
    recommendation: 'Invest in technology and online sales',
  },
];

export function buildDefaultRuleCatalog(): RuleCatalog {
  return Object.freeze({
    general: GENERAL_RULES,
    businessSpecific: BUSINESS_RULES,
    contextual: CONTEXTUAL_RULES,
  });
}
