import type {
  MeddicField,
  MeddicFieldState,
  MeddicMap,
  PreCallBrief,
} from "../types";

// Snapshots handed to async readers are frozen all the way down
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

type MeddicSeed = Partial<Record<MeddicField, { complete: boolean; notes: string[] }>>;

function seedField(seed: MeddicSeed, field: MeddicField): MeddicFieldState {
  const seeded = seed[field];
  return { complete: seeded?.complete ?? false, notes: [...(seeded?.notes ?? [])] };
}

export function createMeddicMap(seed: MeddicSeed = {}): MeddicMap {
  return {
    metrics: seedField(seed, "metrics"),
    economic_buyer: seedField(seed, "economic_buyer"),
    decision_criteria: seedField(seed, "decision_criteria"),
    decision_process: seedField(seed, "decision_process"),
    pain: seedField(seed, "pain"),
    champion: seedField(seed, "champion"),
  };
}

export const EMPTY_BRIEF: PreCallBrief = {
  prospect: { name: "Prospect", company: "their company", role: null },
  currentSolution: null,
  meddic: {},
  anticipatedObjections: [],
  notes: null,
};
