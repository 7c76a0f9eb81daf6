/**
 * Candidate Locations — attractiveness of areas where the chain is not yet present.
 *
 * attractiveness = 0.30 × min(population / 5000, 100)
 *                + 15 (university nearby)
 *                + 0.25 × foot-traffic tier × 20
 *                + 0.20 × cafe-density curve (low 30, medium 50, high 35)
 *                − 0.10 × rent tier × 5
 * clamped to [0, 100].
 */

import type { CafeDensity, CandidateAreaRow } from '@branchlens/core';
import { clamp, compareCodePoints, formatCount, round2 } from '@branchlens/shared';
import type { CandidateLocation } from '../types';

// ── Constants ────────────────────────────────────────────────────────

export const CANDIDATE_LIMIT = 10;

export const CAFE_DENSITY_SCORES: Record<CafeDensity, number> = {
  low: 30,
  medium: 50,
  high: 35,
};

const UNIVERSITY_BONUS = 15;
const POPULATION_PER_POINT = 5000;
const LARGE_POPULATION = 100_000;
const MID_POPULATION = 50_000;
const HIGH_TIER = 4;

// ── Scoring ──────────────────────────────────────────────────────────

export function attractiveness(area: CandidateAreaRow): number {
  const population = Math.min(area.population / POPULATION_PER_POINT, 100);
  const raw =
    population * 0.3 +
    (area.universityNearby ? UNIVERSITY_BONUS : 0) +
    area.footTrafficTier * 20 * 0.25 +
    CAFE_DENSITY_SCORES[area.cafeDensity] * 0.2 -
    area.rentTier * 5 * 0.1;
  return round2(clamp(raw, 0, 100));
}

export function describeArea(area: CandidateAreaRow): { pros: string[]; cons: string[] } {
  const pros: string[] = [];
  const cons: string[] = [];
  const population = formatCount(area.population);

  if (area.population >= LARGE_POPULATION) pros.push(`Large population (${population})`);
  else if (area.population >= MID_POPULATION) pros.push(`Mid-size population (${population})`);
  else cons.push(`Small population (${population})`);

  if (area.universityNearby) pros.push('University nearby (young demographic)');
  if (area.footTrafficTier >= HIGH_TIER) pros.push('High foot traffic');
  if (area.rentTier >= HIGH_TIER) cons.push(`High commercial rent (tier ${area.rentTier}/5)`);

  switch (area.cafeDensity) {
    case 'high':
      cons.push('High cafe density — competitive market');
      break;
    case 'medium':
      pros.push('Moderate cafe scene — market exists but not saturated');
      break;
    case 'low':
      pros.push('Low cafe density — first-mover opportunity');
      break;
  }

  return { pros, cons };
}

export function scoreCandidate(area: CandidateAreaRow): CandidateLocation {
  return {
    area: area.area,
    governorate: area.governorate,
    score: attractiveness(area),
    population: Math.round(area.population),
    universityNearby: area.universityNearby,
    footTrafficTier: area.footTrafficTier,
    rentTier: area.rentTier,
    cafeDensity: area.cafeDensity,
    ...describeArea(area),
  };
}

/** Areas without a branch, score descending (ties by area name), top `limit`. */
export function rankCandidateLocations(
  areas: readonly CandidateAreaRow[],
  limit: number = CANDIDATE_LIMIT,
): CandidateLocation[] {
  return areas
    .filter((a) => !a.chainPresent)
    .map(scoreCandidate)
    .sort((a, b) => b.score - a.score || compareCodePoints(a.area, b.area))
    .slice(0, limit);
}
