import { EligibilityCriteria } from "./candidate";

// api credentials, supplied by the operator
export interface Credentials {
  readonly apiUser: string;
  readonly apiKey: string;
}

// cycle scheduling
export interface CycleOptions {
  readonly maxCycles: number;
  readonly intervalSeconds: number;
  readonly singleRun: boolean;
}

// everything a run needs, built once at startup
export interface RunConfig {
  readonly credentials: Credentials;
  readonly criteria: EligibilityCriteria;
  readonly cycles: CycleOptions;
}
