// ============================================================================
// Cash Logistics MCP Server — Consolidation-Opportunity Rule
// ============================================================================
//
// A grouping pass, not a routing optimizer: stops are only compared within
// the same (carrier, weekday). Distance gates candidacy only when the stores
// table carries latitude/longitude.

import { DAY_NAMES } from "../constants.js";
import type { Repositories } from "../repositories/index.js";
import type {
    ActiveSchedule,
    ConsolidationOpportunity,
    ConsolidationRuleConfig,
    StoreCoordinates,
} from "../types.js";
import { haversineKm, roundCurrency } from "../utils.js";

export interface ConsolidationQuery {
    storeId?: string;
}

/**
 * Partition stops into connected components where an edge joins two stops
 * within `maxDistanceKm`. Stops without coordinates are dropped.
 */
export function proximityClusters(
    stops: readonly ActiveSchedule[],
    coordinates: ReadonlyMap<string, StoreCoordinates>,
    maxDistanceKm: number
): ActiveSchedule[][] {
    const located = stops.filter((s) => coordinates.has(s.storeId));
    const seen = new Set<number>();
    const clusters: ActiveSchedule[][] = [];

    for (let start = 0; start < located.length; start++) {
        if (seen.has(start)) continue;
        seen.add(start);
        const cluster: ActiveSchedule[] = [];
        const queue = [start];
        while (queue.length > 0) {
            const i = queue.shift();
            if (i === undefined) break;
            cluster.push(located[i]);
            const a = coordinates.get(located[i].storeId);
            for (let j = 0; j < located.length; j++) {
                if (seen.has(j)) continue;
                const b = coordinates.get(located[j].storeId);
                if (a && b && haversineKm(a.latitude, a.longitude, b.latitude, b.longitude) <= maxDistanceKm) {
                    seen.add(j);
                    queue.push(j);
                }
            }
        }
        clusters.push(cluster);
    }
    return clusters;
}

export class ConsolidationRuleService {
    constructor(private repos: Repositories) { }

    find(query: ConsolidationQuery, config: ConsolidationRuleConfig): ConsolidationOpportunity[] {
        const proximityChecked = this.repos.catalog.hasColumns("stores", ["latitude", "longitude"]);
        const coordinates = proximityChecked ? this.repos.stores.coordinates() : null;

        const groups = new Map<string, ActiveSchedule[]>();
        for (const s of this.repos.schedules.active()) {
            const key = `${s.carrierId}:${s.dayOfWeek}`;
            const group = groups.get(key) ?? [];
            // one stop per store within a (carrier, day)
            if (!group.some((g) => g.storeId === s.storeId)) group.push(s);
            groups.set(key, group);
        }

        const out: ConsolidationOpportunity[] = [];
        for (const group of groups.values()) {
            const clusters = coordinates ? proximityClusters(group, coordinates, config.maxDistanceKm) : [group];

            for (const cluster of clusters) {
                if (cluster.length < 2) continue;
                if (query.storeId !== undefined && !cluster.some((s) => s.storeId === query.storeId)) continue;

                const distinctTimes = [...new Set(cluster.map((s) => s.scheduledTime))].sort();
                if (distinctTimes.length < 2) continue;

                const first = cluster[0];
                const stopsSaved = cluster.length - 1;
                out.push({
                    carrierId: first.carrierId,
                    carrierName: first.carrierName,
                    dayOfWeek: first.dayOfWeek,
                    dayName: DAY_NAMES[first.dayOfWeek],
                    stores: cluster
                        .map((s) => ({ storeId: s.storeId, scheduledTime: s.scheduledTime }))
                        .sort((a, b) => a.storeId.localeCompare(b.storeId)),
                    distinctTimes,
                    stopsSaved,
                    estimatedWeeklySavings:
                        first.basePickupCost === null ? null : roundCurrency(stopsSaved * first.basePickupCost),
                    proximityChecked,
                });
            }
        }

        return out.sort((a, b) =>
            b.stopsSaved - a.stopsSaved || a.carrierId - b.carrierId || a.dayOfWeek - b.dayOfWeek
        );
    }
}
