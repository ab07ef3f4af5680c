import { ConfigError } from "./errors.js";
import { clampInt } from "./translators.js";
import {
  POSITION_MAX,
  POSITION_MIN,
  THRUST_MAX,
  THRUST_MIN,
  VIBRATE_MAX,
  VIBRATE_MIN,
  type DesiredState,
  type PartialSettings,
  type StrokeRange,
} from "./types.js";

function defaultState(): DesiredState {
  return { vibration: 0, thrusting: 0 };
}

function copyState(state: DesiredState): DesiredState {
  const copy: DesiredState = { vibration: state.vibration, thrusting: state.thrusting };
  if (state.position !== undefined) copy.position = state.position;
  if (state.strokeRange !== undefined) copy.strokeRange = [state.strokeRange[0], state.strokeRange[1]];
  return copy;
}

function normalizeRange(range: StrokeRange): StrokeRange {
  const low = clampInt(range[0], POSITION_MIN, POSITION_MAX);
  const high = clampInt(range[1], POSITION_MIN, POSITION_MAX);
  if (low >= high) {
    throw new ConfigError(`Stroke range must have low < high, got ${low}-${high}`);
  }
  return [low, high];
}

/**
 * Last commanded value of every facet, per accessory. Facets only ever
 * read and write this store, never each other.
 */
export class DesiredStateStore {
  private states = new Map<string, DesiredState>();

  /**
   * Apply a partial update and return the full resulting state.
   * Validation happens before anything is written, so a rejected update
   * leaves the stored state as it was.
   */
  merge(accessoryId: string, partial: PartialSettings): DesiredState {
    const next = copyState(this.states.get(accessoryId) ?? defaultState());

    if (typeof partial.vibration === "number") {
      next.vibration = clampInt(partial.vibration, VIBRATE_MIN, VIBRATE_MAX);
    }
    if (typeof partial.thrusting === "number") {
      next.thrusting = clampInt(partial.thrusting, THRUST_MIN, THRUST_MAX);
    }

    if (partial.position === null) {
      delete next.position;
    } else if (typeof partial.position === "number") {
      next.position = clampInt(partial.position, POSITION_MIN, POSITION_MAX);
    }

    if (partial.strokeRange === null) {
      delete next.strokeRange;
    } else if (partial.strokeRange !== undefined) {
      next.strokeRange = normalizeRange(partial.strokeRange);
    }

    this.states.set(accessoryId, next);
    return copyState(next);
  }

  get(accessoryId: string): DesiredState {
    return copyState(this.states.get(accessoryId) ?? defaultState());
  }

  has(accessoryId: string): boolean {
    return this.states.has(accessoryId);
  }

  clear(): void {
    this.states.clear();
  }
}
