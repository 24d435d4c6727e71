import { setTimeout as delay } from "timers/promises";
import { AxiosInstance } from "axios";
import { EligibilityCriteria } from "../shared/types/candidate";
import { CycleOptions } from "../shared/types/common";
import { CycleReport } from "../shared/types/invitation";
import { LogSink, logger, withCycleContext } from "../shared/utils/logger";
import { selectEligible } from "./eligibility";
import { submitInvitations } from "./invitationSubmitter";
import { fetchCandidates } from "./userFetcher";

export interface CycleDependencies {
  client: AxiosInstance;
  criteria: EligibilityCriteria;
  log: LogSink;
  now?: () => Date;
}

// one fetch-filter-invite pass
export async function runCycle({ client, criteria, log, now = () => new Date() }: CycleDependencies): Promise<CycleReport> {
  log.info("Fetching users and inviting them to party...");

  const candidates = await fetchCandidates(client);
  const batch = selectEligible(candidates, criteria, now());
  log.debug(`Fetched ${candidates.length} users, ${batch.length} eligible.`);

  if (batch.length > 0) {
    log.info(`Found ${batch.length} valid users to invite.`);
  }

  const invited = await submitInvitations(client, batch, log);
  return { fetched: candidates.length, eligible: batch.length, invited };
}

export type Cycle = (cycle: number, log: LogSink) => Promise<CycleReport>;

export type Wait = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RunControl {
  signal?: AbortSignal;
  wait?: Wait;
}

export interface RunSummary {
  cyclesRun: number;
  stopped: boolean;
  reports: CycleReport[];
}

// rejects with an AbortError as soon as the signal fires
export const waitFor: Wait = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Runs cycles back to back, sleeping between them but never after the last one.
 *
 * Errors thrown by a cycle end the run immediately. An aborted signal ends the
 * wait early and no further cycle starts; the summary then has `stopped: true`.
 */
export async function runCycles(options: CycleOptions, cycle: Cycle, { signal, wait = waitFor }: RunControl = {}): Promise<RunSummary> {
  const total = options.singleRun ? 1 : Math.max(1, options.maxCycles);
  const summary: RunSummary = { cyclesRun: 0, stopped: false, reports: [] };

  if (options.singleRun) {
    logger.info("Single-run mode: Executing one cycle...");
  } else {
    logger.info(`Running ${total} cycles with ${options.intervalSeconds} seconds interval...`);
  }

  for (let i = 1; i <= total; i += 1) {
    if (signal?.aborted) {
      summary.stopped = true;
      break;
    }

    if (!options.singleRun) {
      logger.info(`=== Cycle ${i}/${total} ===`);
    }

    try {
      summary.reports.push(await cycle(i, withCycleContext(i)));
      summary.cyclesRun = i;
    } catch (error) {
      if (signal?.aborted) {
        summary.stopped = true;
        break;
      }
      throw error;
    }

    if (i < total) {
      logger.info(`Waiting ${options.intervalSeconds} seconds for next cycle...`);
      try {
        await wait(options.intervalSeconds * 1000, signal);
      } catch (error) {
        if (signal?.aborted) {
          summary.stopped = true;
          break;
        }
        throw error;
      }
    }
  }

  if (summary.stopped) {
    logger.warn(`Stopped after ${summary.cyclesRun} of ${total} cycles.`);
  } else if (options.singleRun) {
    logger.info("Single-run completed. Exiting.");
  } else {
    logger.info(`Completed all ${total} cycles. Exiting.`);
  }

  return summary;
}
