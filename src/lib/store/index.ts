/**
 * Result store selection by persistence driver.
 */

import { getPersistenceDriver } from "../config.js";
import { DbResultStore } from "./dbResultStore.js";
import { FileResultStore } from "./fileResultStore.js";
import type { ResultStore } from "./types.js";

export type { ResultStore, EvaluationTx } from "./types.js";

export function createResultStore(): ResultStore {
  return getPersistenceDriver() === "db" ? new DbResultStore() : new FileResultStore();
}
