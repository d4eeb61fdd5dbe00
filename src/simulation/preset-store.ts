import { createStore, type StoreApi } from "zustand/vanilla";
import { createJSONStorage, persist } from "zustand/middleware";
import { PRESETS_STORAGE_KEY } from "../constants";
import { compileActivation, type ActivationSource } from "./activation";
import type { PersistedStoreOptions } from "./parameter-store";
import {
  ActivationPresetSchema, FilterPresetSchema, PresetsSchema,
  type ActivationPreset, type FilterPreset,
} from "./settings-schema";

export type PresetKind = "filter" | "activation";

export interface PresetState {
  filterPresets: FilterPreset[];
  activationPresets: ActivationPreset[];
  /** Saves a named filter. A preset with the same (trimmed) name is replaced. */
  addFilterPreset: (name: string, filter: readonly number[]) => void;
  /** Saves a named activation after checking that it compiles. */
  addActivationPreset: (name: string, activation: ActivationSource) => void;
  removePreset: (kind: PresetKind, name: string) => void;
}

export type PresetStore = StoreApi<PresetState>;

function upsert<T extends { name: string }>(list: T[], item: T): T[] {
  const index = list.findIndex((p) => p.name === item.name);
  if (index < 0) return [...list, item];
  const next = [...list];
  next[index] = item;
  return next;
}

/** Named filter and activation presets, persisted across sessions. */
export function createPresetStore(options: PersistedStoreOptions = {}): PresetStore {
  return createStore<PresetState>()(
    persist(
      (set) => ({
        filterPresets: [],
        activationPresets: [],

        addFilterPreset: (name, filter) => {
          const preset = FilterPresetSchema.parse({ name, filter: [...filter] });
          set((state) => ({ filterPresets: upsert(state.filterPresets, preset) }));
          console.info(`Saved filter preset "${preset.name}"`);
        },

        addActivationPreset: (name, activation) => {
          const preset = ActivationPresetSchema.parse({ name, activation });
          compileActivation(preset.activation);
          set((state) => ({ activationPresets: upsert(state.activationPresets, preset) }));
          console.info(`Saved activation preset "${preset.name}"`);
        },

        removePreset: (kind, name) =>
          set((state) => kind === "filter"
            ? { filterPresets: state.filterPresets.filter((p) => p.name !== name) }
            : { activationPresets: state.activationPresets.filter((p) => p.name !== name) }),
      }),
      {
        name: options.storageKey ?? PRESETS_STORAGE_KEY,
        storage: createJSONStorage(() => options.storage ?? window.localStorage),
        partialize: (state) => ({
          filterPresets: state.filterPresets,
          activationPresets: state.activationPresets,
        }),
        merge: (persisted, current) => {
          if (persisted === undefined) return current;
          const parsed = PresetsSchema.safeParse(persisted);
          if (!parsed.success) {
            console.warn("Discarding stored NCA presets:", parsed.error.issues[0]?.message);
            return current;
          }
          return { ...current, ...parsed.data };
        },
      },
    ),
  );
}
