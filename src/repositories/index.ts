// ============================================================================
// Cash Logistics MCP Server — Repository Barrel Export
// ============================================================================

export { CatalogRepo } from "./catalog.repo.js";
export { StoresRepo } from "./stores.repo.js";
export { SchedulesRepo } from "./schedules.repo.js";
export { PickupsRepo } from "./pickups.repo.js";
export type { PickupOutcome } from "./pickups.repo.js";
export { CostsRepo } from "./costs.repo.js";
export type { CarrierInvoice, PickupCost } from "./costs.repo.js";

import type { QueryExecutor } from "../services/query-executor.service.js";
import { CatalogRepo } from "./catalog.repo.js";
import { StoresRepo } from "./stores.repo.js";
import { SchedulesRepo } from "./schedules.repo.js";
import { PickupsRepo } from "./pickups.repo.js";
import { CostsRepo } from "./costs.repo.js";

export interface Repositories {
    catalog: CatalogRepo;
    stores: StoresRepo;
    schedules: SchedulesRepo;
    pickups: PickupsRepo;
    costs: CostsRepo;
}

/**
 * Create all repository instances on top of a single executor.
 * Repositories never hold a connection of their own.
 */
export function createRepositories(executor: QueryExecutor): Repositories {
    return {
        catalog: new CatalogRepo(executor),
        stores: new StoresRepo(executor),
        schedules: new SchedulesRepo(executor),
        pickups: new PickupsRepo(executor),
        costs: new CostsRepo(executor),
    };
}
