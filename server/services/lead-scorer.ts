import { LEAD_SCORE, YES, type LeadScore, type Village } from '@shared/schema';

export interface LeadAssessment {
  points: number;     // 0-5
  breakdown: {
    houses: number;
    fence: number;
    checkpoint: number;
    security: number;
    built: number;
  };
  score: LeadScore;
}

const MIN_HOUSES = 20;
const TARGET_POINTS = 4;
const REVIEW_POINTS = 2;

/**
 * Lead rubric, one point each:
 * - 20+ houses/plots
 * - Fenced
 * - Has a checkpoint
 * - Has security
 * - Built (status mentions "построен")
 *
 * 4-5 → Целевой, 2-3 → Требует проверки, otherwise Нецелевой.
 */
export function assessLead(village: Pick<Village, 'house_count' | 'has_fence' | 'has_checkpoint' | 'has_security' | 'status'>): LeadAssessment {
  const breakdown = {
    houses: village.house_count !== null && village.house_count >= MIN_HOUSES ? 1 : 0,
    fence: village.has_fence === YES ? 1 : 0,
    checkpoint: village.has_checkpoint === YES ? 1 : 0,
    security: village.has_security === YES ? 1 : 0,
    built: village.status !== null && village.status.toLowerCase().includes('построен') ? 1 : 0,
  };

  const points = breakdown.houses + breakdown.fence + breakdown.checkpoint + breakdown.security + breakdown.built;

  return { points, breakdown, score: getLeadScore(points) };
}

export function getLeadScore(points: number): LeadScore {
  if (points >= TARGET_POINTS) return LEAD_SCORE.target;
  if (points >= REVIEW_POINTS) return LEAD_SCORE.needsReview;
  return LEAD_SCORE.nonTarget;
}

/**
 * Copy of the record with its lead score recomputed.
 */
export function withLeadScore(village: Village): Village {
  return { ...village, lead_score: assessLead(village).score };
}
