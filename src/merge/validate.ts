import { LogicalClock, METHOD_TIMELINE } from "../clock/logicalClock.js";
import type { TraceLine } from "../trace/types.js";
import { isAllocation } from "../trace/types.js";

export interface ValidationReport {
  deathsInOrder: number;
  deathsAfterAllocation: number;
  allocatedObjects: number;
  violations: string[];
}

/**
 * Replays a merged trace on the method timeline. A death is in order when its
 * timestamp is not ahead of the clock where it appears, and it is after its
 * allocation when its timestamp is not behind the allocation's time.
 */
export function validateMergedTrace(lines: TraceLine[]): ValidationReport {
  const clock = new LogicalClock(METHOD_TIMELINE);
  const allocationTimes = new Map<string, number>();
  const report: ValidationReport = {
    deathsInOrder: 0,
    deathsAfterAllocation: 0,
    allocatedObjects: 0,
    violations: []
  };

  lines.forEach((line) => {
    if (line.kind !== "record") {
      return;
    }
    const { record } = line;
    const time = clock.stamp(record);

    if (isAllocation(record)) {
      allocationTimes.set(record.objectId, time);
      return;
    }
    if (record.kind !== "death") {
      return;
    }

    const allocatedAt = allocationTimes.get(record.objectId);
    if (allocatedAt !== undefined) {
      if (record.timestamp >= allocatedAt) {
        report.deathsAfterAllocation++;
      } else {
        report.violations.push(
          `Object ${record.objectId} died at ${record.timestamp} but was allocated at ${allocatedAt}`
        );
      }
    }

    if (record.timestamp <= clock.now()) {
      report.deathsInOrder++;
    } else {
      report.violations.push(
        `Death of object ${record.objectId} at ${record.timestamp} appears at logical time ${clock.now()}`
      );
    }
  });

  report.allocatedObjects = allocationTimes.size;
  return report;
}
