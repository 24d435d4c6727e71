import { subDays } from "date-fns";
import { Candidate, EligibilityCriteria } from "../shared/types/candidate";
import { InvitationBatch } from "../shared/types/invitation";

export const DEFAULT_CRITERIA: EligibilityCriteria = Object.freeze({
  minLevel: 0,
  language: null,
  onlyActive: false,
});

/**
 * Same wall-clock time one month earlier. A day that does not exist in the
 * previous month rolls over into the next one (31 Mar -> 3 Mar), unlike
 * date-fns' subMonths, which clamps to the month's last day.
 */
export function oneMonthBefore(now: Date): Date {
  return new Date(
    now.getFullYear(),
    now.getMonth() - 1,
    now.getDate(),
    now.getHours(),
    now.getMinutes(),
    now.getSeconds(),
    now.getMilliseconds(),
  );
}

// created more than a month ago and seen within the last four days
function isActive(candidate: Candidate, now: Date): boolean {
  const oneMonthAgo = oneMonthBefore(now);
  const recently = subDays(now, 4);

  // a missing created timestamp counts as the oldest possible account
  const createdLongAgo = candidate.createdAt === null || candidate.createdAt.getTime() < oneMonthAgo.getTime();
  const loggedInRecently = candidate.lastLoginAt !== null && candidate.lastLoginAt.getTime() > recently.getTime();

  return createdLongAgo && loggedInRecently;
}

export function isEligible(candidate: Candidate, criteria: EligibilityCriteria, now: Date = new Date()): boolean {
  if (candidate.id === "") {
    return false;
  }

  if (candidate.level < criteria.minLevel) {
    return false;
  }

  if (criteria.language !== null && candidate.language !== criteria.language) {
    return false;
  }

  if (criteria.onlyActive) {
    return isActive(candidate, now);
  }

  return true;
}

export function selectEligible(
  candidates: readonly Candidate[],
  criteria: EligibilityCriteria,
  now: Date = new Date(),
): InvitationBatch {
  return candidates.filter((candidate) => isEligible(candidate, criteria, now)).map((candidate) => candidate.id);
}
