/**
 * Data Validator
 *
 * Grades an area snapshot before it is scored.
 *
 *   overall = 0.3·completeness + 0.3·accuracy + 0.2·consistency + 0.2·timeliness
 *
 * TEXT: ≥0.9 excellent, ≥0.7 good, ≥0.5 fair, ≥0.3 poor, else very_poor
 */

import { createLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { FEATURE_TAGS, round, type BusinessId, type FeatureTag } from '../contracts/site-decision.types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type IssueCategory = 'completeness' | 'accuracy' | 'consistency' | 'input' | 'system';
export type IssueSeverity = 'low' | 'medium' | 'high' | 'critical';
export type QualityText = 'excellent' | 'good' | 'fair' | 'poor' | 'very_poor' | 'unknown';

export interface DataQualityIssue {
  category: IssueCategory;
  severity: IssueSeverity;
  message: string;
  impact: string;
  recommendation: string;
}

export interface PlaceRecord {
  name?: string;
  category?: string;
  lat?: number;
  lon?: number;
}

export interface Coordinates {
  lat: number;
  lon: number;
  /** meters */
  radius?: number;
}

export interface AreaSnapshot {
  osmCounts: Partial<Record<FeatureTag, number>>;
  categoryCounts: Record<BusinessId, number>;
  places?: readonly PlaceRecord[];
  coordinates?: Coordinates;
}

export interface DataQualityReport {
  overallQuality: number;
  qualityText: QualityText;
  completeness: number;
  accuracy: number;
  consistency: number;
  timeliness: number;
  issues: DataQualityIssue[];
  sources: string[];
  warnings: string[];
  coverage: Record<FeatureTag, boolean>;
}

export interface AnalysisRequestInputs {
  address?: string;
  radius?: number;
  priceMin?: number;
  priceMax?: number;
}

const QUALITY_WEIGHTS = { completeness: 0.3, accuracy: 0.3, consistency: 0.2, timeliness: 0.2 } as const;
const SUSPICIOUS_COUNT = 50;
const METERS_PER_DEGREE = 111_000;

export function qualityText(score: number): QualityText {
  if (score >= 0.9) return 'excellent';
  if (score >= 0.7) return 'good';
  if (score >= 0.5) return 'fair';
  if (score >= 0.3) return 'poor';
  return 'very_poor';
}

function tagCount(snapshot: AreaSnapshot, tag: FeatureTag): number {
  return snapshot.osmCounts[tag] ?? 0;
}

function hasOsm(snapshot: AreaSnapshot): boolean {
  return FEATURE_TAGS.some((tag) => tagCount(snapshot, tag) > 0);
}

function isCompletePlace(p: PlaceRecord): boolean {
  return Boolean(p.name && p.category && p.lat !== undefined && p.lon !== undefined);
}

// ═══════════════════════════════════════════════════════════════
// SOURCE CHECKS
// ═══════════════════════════════════════════════════════════════

export function osmCoverage(snapshot: AreaSnapshot): Record<FeatureTag, boolean> {
  const coverage: Record<FeatureTag, boolean> = {
    school: false,
    hospital: false,
    pharmacy: false,
    police: false,
    bus_stop: false,
    subway: false,
    park: false,
    office: false,
    residential: false,
  };
  for (const tag of FEATURE_TAGS) coverage[tag] = tagCount(snapshot, tag) > 0;
  return coverage;
}

function osmIssues(snapshot: AreaSnapshot): DataQualityIssue[] {
  const issues: DataQualityIssue[] = [];
  if (tagCount(snapshot, 'hospital') === 0) {
    issues.push({
      category: 'completeness',
      severity: 'medium',
      message: 'No hospital data',
      impact: 'Affects the safety and healthcare assessment',
      recommendation: 'Check medical facilities in the area manually',
    });
  }
  if (tagCount(snapshot, 'police') === 0) {
    issues.push({
      category: 'completeness',
      severity: 'medium',
      message: 'No police station data',
      impact: 'Affects the security assessment',
      recommendation: 'Verify the security situation in the area',
    });
  }
  for (const tag of FEATURE_TAGS) {
    const value = tagCount(snapshot, tag);
    if (value > SUSPICIOUS_COUNT) {
      issues.push({
        category: 'accuracy',
        severity: 'low',
        message: `Unusually high ${tag} count: ${value}`,
        impact: 'May skew the analysis',
        recommendation: 'Cross-check with another data source',
      });
    }
  }
  return issues;
}

function placeIssues(snapshot: AreaSnapshot): DataQualityIssue[] {
  const places = snapshot.places ?? [];
  if (places.length === 0) {
    return [
      {
        category: 'completeness',
        severity: 'critical',
        message: 'No business data from the places provider',
        impact: 'Competition cannot be analyzed accurately',
        recommendation: 'Check the provider connection or widen the search radius',
      },
    ];
  }

  const issues: DataQualityIssue[] = [];
  const completeRatio = places.filter(isCompletePlace).length / places.length;
  if (completeRatio < 0.8) {
    issues.push({
      category: 'completeness',
      severity: 'medium',
      message: `Only ${(completeRatio * 100).toFixed(1)}% of business records are complete`,
      impact: 'Some competitors may be missing',
      recommendation: 'Add another data source or survey the area',
    });
  }

  const counted = Object.values(snapshot.categoryCounts).reduce((acc, n) => acc + n, 0);
  if (Math.abs(places.length - counted) > places.length * 0.2) {
    issues.push({
      category: 'consistency',
      severity: 'medium',
      message: 'Place count and category counts disagree',
      impact: 'Competition analysis may be inaccurate',
      recommendation: 'Review the category mapping',
    });
  }

  if (places.length < 5) {
    issues.push({
      category: 'completeness',
      severity: 'high',
      message: 'Too few businesses for a reliable analysis',
      impact: 'Results may be inaccurate',
      recommendation: 'Widen the search radius or choose another area',
    });
  }
  return issues;
}

function coordinateIssues(snapshot: AreaSnapshot): DataQualityIssue[] {
  const coords = snapshot.coordinates;
  if (!coords) {
    return [
      {
        category: 'completeness',
        severity: 'critical',
        message: 'Missing coordinates',
        impact: 'Spatial analysis is not possible',
        recommendation: 'Check the geocoding service',
      },
    ];
  }

  const issues: DataQualityIssue[] = [];
  if (!Number.isFinite(coords.lat) || !Number.isFinite(coords.lon) || Math.abs(coords.lat) > 90 || Math.abs(coords.lon) > 180) {
    issues.push({
      category: 'accuracy',
      severity: 'critical',
      message: 'Coordinates are out of range',
      impact: 'The location cannot be determined',
      recommendation: 'Enter a more precise address',
    });
  }
  if (coords.radius !== undefined && (coords.radius < 100 || coords.radius > 10_000)) {
    issues.push({
      category: 'accuracy',
      severity: 'medium',
      message: `Radius ${coords.radius}m looks unreasonable`,
      impact: 'Too little or too much data may be collected',
      recommendation: 'Use a radius between 500 and 3000m',
    });
  }
  return issues;
}

// ═══════════════════════════════════════════════════════════════
// COMPONENT SCORES
// ═══════════════════════════════════════════════════════════════

export function completenessScore(snapshot: AreaSnapshot): number {
  const present = [
    hasOsm(snapshot),
    Object.keys(snapshot.categoryCounts).length > 0,
    (snapshot.places?.length ?? 0) > 0,
    snapshot.coordinates !== undefined,
  ].filter(Boolean).length;
  const covered = FEATURE_TAGS.filter((tag) => tagCount(snapshot, tag) > 0).length;
  return (present / 4) * 0.6 + (covered / FEATURE_TAGS.length) * 0.4;
}

const ACCURACY_PENALTY: Record<IssueSeverity, number> = { critical: 0.3, high: 0.2, medium: 0.1, low: 0.05 };

export function accuracyScore(snapshot: AreaSnapshot, issues: readonly DataQualityIssue[]): number {
  let score = 0.8;
  for (const issue of issues) {
    if (issue.category === 'accuracy') score -= ACCURACY_PENALTY[issue.severity];
  }

  const places = snapshot.places ?? [];
  if (hasOsm(snapshot) && places.length > 0) {
    if (tagCount(snapshot, 'office') > 10 && places.length < 5) score -= 0.1;
    const education = places.filter((p) => p.category === 'bookstore' || p.category === 'stationery').length;
    if (tagCount(snapshot, 'school') > 3 && education === 0) score -= 0.05;
  }
  return Math.max(score, 0);
}

export function consistencyScore(snapshot: AreaSnapshot): number {
  let score = 1;
  const places = snapshot.places ?? [];
  const counted = Object.values(snapshot.categoryCounts).reduce((acc, n) => acc + n, 0);

  if (places.length > 0 && Object.keys(snapshot.categoryCounts).length > 0) {
    if (Math.abs(places.length - counted) / places.length > 0.3) score -= 0.2;
  }

  const center = snapshot.coordinates;
  if (center && places.length > 0) {
    const limit = (center.radius ?? 2000) * 1.5;
    const located = places.filter((p) => p.lat !== undefined && p.lon !== undefined);
    const outliers = located.filter((p) => {
      const dLat = center.lat - (p.lat ?? center.lat);
      const dLon = center.lon - (p.lon ?? center.lon);
      return Math.hypot(dLat, dLon) * METERS_PER_DEGREE > limit;
    }).length;
    if (outliers / places.length > 0.2) score -= 0.3;
  }
  return Math.max(score, 0);
}

export function timelinessScore(snapshot: AreaSnapshot): number {
  let score = 0.8;
  if ((snapshot.places?.length ?? 0) === 0) score -= 0.3;
  if (!hasOsm(snapshot)) score -= 0.2;
  return Math.max(score, 0);
}

function qualityWarnings(overall: number, issues: readonly DataQualityIssue[]): string[] {
  const warnings: string[] = [];
  if (overall < 0.3) warnings.push('Data quality is very low; results may be unreliable');
  else if (overall < 0.5) warnings.push('Data quality is limited; collect more information');
  else if (overall < 0.7) warnings.push('Data quality is acceptable but could be improved');

  if (issues.some((i) => i.severity === 'critical')) warnings.push('Critical data problems detected; review the inputs');
  if (issues.filter((i) => i.severity === 'high').length > 2) warnings.push('Several significant data problems detected');
  return warnings;
}

// ═══════════════════════════════════════════════════════════════
// VALIDATOR
// ═══════════════════════════════════════════════════════════════

export class DataValidator {
  constructor(private readonly logger: Logger = createLogger('data-validator')) {}

  validate(snapshot: AreaSnapshot): DataQualityReport {
    try {
      const issues = [...osmIssues(snapshot), ...placeIssues(snapshot), ...coordinateIssues(snapshot)];
      const sources: string[] = [];
      if (hasOsm(snapshot)) sources.push('OpenStreetMap');
      if ((snapshot.places?.length ?? 0) > 0) sources.push('Places API');
      if (snapshot.coordinates) sources.push('Geocoding');

      const completeness = completenessScore(snapshot);
      const accuracy = accuracyScore(snapshot, issues);
      const consistency = consistencyScore(snapshot);
      const timeliness = timelinessScore(snapshot);
      const overall =
        completeness * QUALITY_WEIGHTS.completeness +
        accuracy * QUALITY_WEIGHTS.accuracy +
        consistency * QUALITY_WEIGHTS.consistency +
        timeliness * QUALITY_WEIGHTS.timeliness;

      return {
        overallQuality: round(overall, 3),
        qualityText: qualityText(overall),
        completeness: round(completeness, 3),
        accuracy: round(accuracy, 3),
        consistency: round(consistency, 3),
        timeliness: round(timeliness, 3),
        issues,
        sources,
        warnings: qualityWarnings(overall, issues),
        coverage: osmCoverage(snapshot),
      };
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, '[DataValidator] validation failed');
      return DataValidator.fallbackReport();
    }
  }

  validateInputs(inputs: AnalysisRequestInputs): DataQualityIssue[] {
    const issues: DataQualityIssue[] = [];
    const address = inputs.address?.trim() ?? '';
    if (!address) {
      issues.push({
        category: 'input',
        severity: 'critical',
        message: 'Address must not be empty',
        impact: 'The analysis cannot run',
        recommendation: 'Enter a specific address',
      });
    } else if (address.length < 10) {
      issues.push({
        category: 'input',
        severity: 'medium',
        message: 'Address looks too short',
        impact: 'The location may not be resolved precisely',
        recommendation: 'Enter a more detailed address',
      });
    }

    if (inputs.radius !== undefined && inputs.radius < 100) {
      issues.push({
        category: 'input',
        severity: 'medium',
        message: 'Radius is too small',
        impact: 'Too little data may be collected',
        recommendation: 'Use a radius of at least 500m',
      });
    } else if (inputs.radius !== undefined && inputs.radius > 5000) {
      issues.push({
        category: 'input',
        severity: 'medium',
        message: 'Radius is too large',
        impact: 'Irrelevant data may be collected',
        recommendation: 'Use a radius below 3000m',
      });
    }

    if (inputs.priceMin !== undefined && inputs.priceMax !== undefined && inputs.priceMin > inputs.priceMax) {
      issues.push({
        category: 'input',
        severity: 'medium',
        message: 'Minimum price is above maximum price',
        impact: 'Places may be filtered incorrectly',
        recommendation: 'Check the price range',
      });
    }
    return issues;
  }

  static fallbackReport(): DataQualityReport {
    return {
      overallQuality: 0.3,
      qualityText: 'unknown',
      completeness: 0.3,
      accuracy: 0.3,
      consistency: 0.3,
      timeliness: 0.3,
      issues: [
        {
          category: 'system',
          severity: 'critical',
          message: 'Validation failed with an internal error',
          impact: 'Data quality could not be assessed',
          recommendation: 'Retry the analysis',
        },
      ],
      sources: [],
      warnings: ['Data quality could not be assessed'],
      coverage: osmCoverage({ osmCounts: {}, categoryCounts: {} }),
    };
  }
}
