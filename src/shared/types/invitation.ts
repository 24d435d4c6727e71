
// ids selected in one cycle, in listing order
export type InvitationBatch = readonly string[];

// invite request body
export interface InviteRequest {
  uuids: string[];
}

// outcome of one fetch-filter-invite pass
export interface CycleReport {
  fetched: number;
  eligible: number;
  invited: number;
}
