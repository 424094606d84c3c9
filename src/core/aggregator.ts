import { formatRgb } from "../util/color.js";
import type { Command, CommandResult, DeviceState, DispatchResults, Outcome, Report } from "../util/types.js";

/** One result per target, in target order; a target with no result becomes a "missing" failure. */
export function aggregate(command: Command, results: DispatchResults): Report {
  const details = command.targets.map(
    (address): CommandResult =>
      results.get(address.key) ?? { address, ok: false, failure: "missing", message: "no result recorded" },
  );
  const succeeded = details.filter((d) => d.ok).length;
  const failed = details.length - succeeded;
  let outcome: Outcome;
  if (failed === 0) outcome = "success";
  else if (succeeded > 0) outcome = "partial_failure";
  else outcome = "failure";
  return { command, outcome, succeeded, failed, details };
}

export type StateJSON = {
  power: DeviceState["power"];
  brightness: number;
  color: string;
  updatedAt: string;
};

export type ReportJSON = {
  command: string;
  targets: string[];
  outcome: Outcome;
  succeeded: number;
  failed: number;
  details: Array<{ address: string; ok: true; state: StateJSON } | { address: string; ok: false; failure: string; message: string }>;
};

export function stateToJSON(s: DeviceState): StateJSON {
  return { power: s.power, brightness: s.brightness, color: formatRgb(s.color), updatedAt: new Date(s.updatedAt).toISOString() };
}

export function reportToJSON(report: Report): ReportJSON {
  const { cmd } = report.command;
  return {
    command: cmd.name,
    targets: report.command.targets.map((t) => t.key),
    outcome: report.outcome,
    succeeded: report.succeeded,
    failed: report.failed,
    details: report.details.map((d) =>
      d.ok
        ? { address: d.address.key, ok: true as const, state: stateToJSON(d.state) }
        : { address: d.address.key, ok: false as const, failure: d.failure, message: d.message },
    ),
  };
}
