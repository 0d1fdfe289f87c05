/**
 * Constraint validation types
 */

export interface ConstraintResult {
  valid: boolean;
  violations: string[];
}

/**
 * Travel budgets for a selected schedule
 */
export interface TravelLimits {
  /** Maximum journey minutes in one day */
  maxDailyMinutes: number;
  /** Maximum journey minutes in one rotation week */
  maxWeeklyMinutes: number;
}

export const DEFAULT_TRAVEL_LIMITS: TravelLimits = {
  maxDailyMinutes: 240,
  maxWeeklyMinutes: 1200,
};
