#!/usr/bin/env node
import { loadEnvConfig } from "./config";
import { USAGE, buildRunConfig, parseCliArgs } from "./config/cli";
import { createHabiticaClient } from "./infrastructure/habitica/client";
import { RunControl, runCycle, runCycles } from "./services/cycleRunner";
import { handleError } from "./shared/utils/errors";
import { configureLogger, logger } from "./shared/utils/logger";

const SIGNAL_EXIT_CODE = 130;

export async function main(
  argv: readonly string[],
  control: Pick<RunControl, "wait"> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, stopping after the current step.`);
    controller.abort();
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const config = loadEnvConfig(env);
    configureLogger(config);

    const flags = parseCliArgs(argv);
    if (flags.help) {
      console.log(USAGE);
      return 0;
    }

    const runConfig = buildRunConfig(flags, config);

    logger.info("Welcome to PartyUp! The script will now start fetching users and inviting them to party.");

    const client = createHabiticaClient(runConfig.credentials, {
      baseUrl: config.habiticaBaseUrl,
      timeoutMs: config.requestTimeoutMs,
      signal: controller.signal,
    });

    const summary = await runCycles(
      runConfig.cycles,
      (_cycle, log) => runCycle({ client, criteria: runConfig.criteria, log }),
      { signal: controller.signal, wait: control.wait },
    );

    return summary.stopped ? SIGNAL_EXIT_CODE : 0;
  } catch (error) {
    const appError = handleError(error);
    logger.error(appError.message, appError.details === undefined ? {} : { details: appError.details });
    return appError.exitCode;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error("Unhandled error:", { error });
      process.exitCode = 1;
    },
  );
}
