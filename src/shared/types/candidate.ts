
// user record from the looking-for-party listing
export interface Candidate {
  id: string;
  level: number;
  language: string;
  createdAt: Date | null;
  lastLoginAt: Date | null;
  updatedAt: Date | null;
}

// filter thresholds, fixed at startup
export interface EligibilityCriteria {
  readonly minLevel: number;
  readonly language: string | null;
  readonly onlyActive: boolean;
}
