import type { Logger } from "../../lib/logger";
import { initSimulation } from "./engine";
import { loadState, saveState } from "./persistence";
import type { Simulation, SimulationSnapshot } from "./types";

/**
 * Create the simulation session controller.
 *
 * Owns the current manager and handles:
 * - first start on a canvas size
 * - hot reload (snapshot, rebuild a fresh manager, restore into it)
 * - JSON export/import of the full state
 */
export function createSessionController(opts: {
  makeSim: () => Simulation;
  width: number;
  height: number;
  logger: Logger;
  onReload?: (sim: Simulation) => void;
}) {
  const { makeSim, width, height, logger, onReload = () => {} } = opts;

  let sim = makeSim();

  function current(): Simulation {
    return sim;
  }

  function start(): Simulation {
    sim = makeSim();
    initSimulation(sim, width, height);
    return sim;
  }

  /** Swap in a fresh manager restored from `snapshot`. */
  function restoreInto(snapshot: unknown): Simulation {
    const next = makeSim();
    loadState(next, snapshot);
    sim = next;
    onReload(sim);
    return sim;
  }

  function reload(): Simulation {
    const snapshot: SimulationSnapshot = saveState(sim);
    restoreInto(snapshot);
    logger.info(`reloaded: ${sim.chambers.length} chambers, ${sim.balls.length} balls`);
    return sim;
  }

  function exportSnapshot(): string {
    return JSON.stringify(saveState(sim));
  }

  /** Restore from JSON text. Returns false, keeping the current manager, when the text does not parse. */
  function importSnapshot(json: string): boolean {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (err) {
      logger.warn("ignoring snapshot: invalid JSON", err);
      return false;
    }
    restoreInto(parsed);
    return true;
  }

  return {
    current,
    start,
    reload,
    exportSnapshot,
    importSnapshot,
  };
}

export type SessionController = ReturnType<typeof createSessionController>;
