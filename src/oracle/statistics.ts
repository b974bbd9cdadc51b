import type { OracleEvent } from "./types.js";

const TOP_SITES = 5;

export interface SiteCount {
  siteId: number;
  allocations: number;
}

export interface OracleStatistics {
  totalEvents: number;
  allocations: number;
  frees: number;
  phantomFrees: number;
  liveObjects: number;
  bytesAllocated: number;
  bytesFreed: number;
  liveBytes: number;
  distinctSites: number;
  topSites: SiteCount[];
}

export function computeStatistics(events: OracleEvent[]): OracleStatistics {
  const siteCounts = new Map<number, number>();
  const stats: OracleStatistics = {
    totalEvents: events.length,
    allocations: 0,
    frees: 0,
    phantomFrees: 0,
    liveObjects: 0,
    bytesAllocated: 0,
    bytesFreed: 0,
    liveBytes: 0,
    distinctSites: 0,
    topSites: []
  };

  let matchedFrees = 0;
  let matchedBytesFreed = 0;

  events.forEach((event) => {
    if (event.kind === "alloc") {
      stats.allocations++;
      stats.bytesAllocated += event.size;
      siteCounts.set(event.siteId, (siteCounts.get(event.siteId) ?? 0) + 1);
    } else {
      stats.frees++;
      stats.bytesFreed += event.size;
      if (event.origin.kind === "phantom") {
        stats.phantomFrees++;
      } else {
        matchedFrees++;
        matchedBytesFreed += event.size;
      }
    }
  });

  // phantom frees release nothing allocated in the trace
  stats.liveObjects = stats.allocations - matchedFrees;
  stats.liveBytes = stats.bytesAllocated - matchedBytesFreed;
  stats.distinctSites = siteCounts.size;
  stats.topSites = Array.from(siteCounts.entries())
    .map(([siteId, allocations]) => ({ siteId, allocations }))
    .sort((a, b) => b.allocations - a.allocations || a.siteId - b.siteId)
    .slice(0, TOP_SITES);

  return stats;
}

export function formatStatistics(stats: OracleStatistics): string[] {
  return [
    "=== Oracle Statistics ===",
    `Total events: ${stats.totalEvents}`,
    `Allocations: ${stats.allocations}`,
    `Frees: ${stats.frees} (${stats.phantomFrees} phantom)`,
    `Live objects (not freed): ${stats.liveObjects}`,
    `Total bytes allocated: ${stats.bytesAllocated}`,
    `Total bytes freed: ${stats.bytesFreed}`,
    `Live bytes: ${stats.liveBytes}`,
    `Allocation sites: ${stats.distinctSites}`,
    "Most active sites:",
    ...stats.topSites.map((site) => `  Site ${site.siteId}: ${site.allocations} allocations`)
  ];
}
