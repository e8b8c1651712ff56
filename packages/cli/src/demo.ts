/**
 * Console walkthrough of the two analyses.
 *
 * Builds the textbook two-process deadlock and reports it, then asks the
 * Banker's oracle whether the grant that would close the cycle is safe.
 */

import type { LineSink } from "@avarodha/core";
import { AllocationMonitor } from "@avarodha/engine";
import type { DeadlockReport, MonitorOptions, RegistrySnapshot, SafetyVerdict } from "@avarodha/engine";

export interface DemoResult {
	snapshot: RegistrySnapshot;
	deadlock: DeadlockReport;
	banker: SafetyVerdict;
}

/** Two single-unit resources, two processes, each holding one resource. */
function crossedHolds(monitor: AllocationMonitor): void {
	monitor.addResource("R1", 1);
	monitor.addResource("R2", 1);
	monitor.addProcess("P1");
	monitor.addProcess("P2");
	monitor.request("P1", "R1", 1);
	monitor.request("P2", "R2", 1);
}

/**
 * Run the scenario, write a report to `out`, and return the raw results.
 */
export function runDemo(out: LineSink = process.stdout, opts: MonitorOptions = {}): DemoResult {
	const monitor = new AllocationMonitor(opts);
	crossedHolds(monitor);
	monitor.request("P1", "R2", 1); // blocked
	monitor.request("P2", "R1", 1); // blocked

	const snapshot = monitor.snapshot();
	out.write("State snapshot:\n");
	out.write(JSON.stringify(snapshot, null, 2) + "\n");

	const deadlock = monitor.detectDeadlock();
	out.write(`Deadlock detected: ${deadlock.hasDeadlock}\n`);
	out.write(`Cycles: ${JSON.stringify(deadlock.cycles)}\n`);

	monitor.reset();
	crossedHolds(monitor);
	for (const pid of ["P1", "P2"]) {
		monitor.setMaxDemand(pid, "R1", 1);
		monitor.setMaxDemand(pid, "R2", 1);
	}
	const banker = monitor.checkSafety("P2", "R1", 1);
	out.write(`Banker safe to grant P2->R1? ${banker.safe} sequence=${JSON.stringify(banker.sequence)}\n`);

	return { snapshot, deadlock, banker };
}
