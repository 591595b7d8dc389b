import { PreconditionError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { CheckResult, Confirm, PreflightCheck } from "./types.js";

export type PreflightReport = Array<{ name: string } & CheckResult>;

/**
 * Run checks in order. The first failure, or a warning the user declines,
 * throws PreconditionError so nothing gets installed.
 */
export async function runPreflight(checks: PreflightCheck[], confirm: Confirm): Promise<PreflightReport> {
  const report: PreflightReport = [];

  for (const check of checks) {
    let result: CheckResult;
    try {
      result = await check.run();
    } catch (err) {
      result = { status: "fail", message: `${check.name} check errored: ${errorMessage(err)}` };
    }
    report.push({ name: check.name, ...result });

    if (result.status === "pass") {
      log.success(result.message, { check: check.name });
      continue;
    }
    if (result.status === "warn") {
      log.warn(result.message, { check: check.name });
      if (await confirm(`${result.message} Do you want to continue anyway?`)) continue;
      log.error(`Stopped at ${check.name} check`, { check: check.name });
      throw new PreconditionError(check.name, `${result.message} (not confirmed)`);
    }
    log.error(result.message, { check: check.name });
    throw new PreconditionError(check.name, result.message);
  }

  return report;
}
