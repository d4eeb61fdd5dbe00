import { createStore, type StoreApi } from "zustand/vanilla";
import { createJSONStorage, persist, type StateStorage } from "zustand/middleware";
import { z } from "zod";
import { SETTINGS_STORAGE_KEY } from "../constants";
import { ActivationCache, type ActivationSource } from "./activation";
import type { Channel } from "./channels";
import { withCoefficient } from "./filters";
import {
  channelSettings, defaultChannelSettings, defaultSettings, loadSettingsDocument, sanitizeSettings,
  snapshotFromSettings, withChannelSettings, type ParameterSnapshot,
} from "./parameters";
import { FilterValuesSchema, NcaSettingsSchema, type NcaSettings } from "./settings-schema";

export interface ParameterState {
  settings: NcaSettings;
  setFilter: (channel: Channel, filter: readonly number[]) => void;
  setFilterCoefficient: (channel: Channel, dx: number, dy: number, value: number) => void;
  /** Compiles `source` first; throws ActivationCompileError and changes nothing if that fails. */
  setActivation: (channel: Channel, source: ActivationSource) => void;
  resetChannel: (channel: Channel) => void;
  /** Replaces all three channels from a settings document, e.g. a loaded file. */
  replaceSettings: (document: unknown) => void;
  /** Filters and compiled activations as of now, for exactly one step. */
  snapshot: () => ParameterSnapshot;
}

export type ParameterStore = StoreApi<ParameterState>;

export interface PersistedStoreOptions {
  /** Where the store persists itself. Defaults to window.localStorage. */
  storage?: StateStorage;
  storageKey?: string;
}

const PersistedSettingsSchema = z.object({ settings: NcaSettingsSchema });

/**
 * Per-channel filters and activations, persisted across sessions.
 *
 * Every edit replaces the settings object rather than mutating it, so a
 * snapshot taken before an edit is never torn by it.
 */
export function createParameterStore(options: PersistedStoreOptions = {}): ParameterStore {
  const cache = new ActivationCache();

  return createStore<ParameterState>()(
    persist(
      (set, get) => ({
        settings: defaultSettings(),

        setFilter: (channel, filter) => {
          const values = FilterValuesSchema.parse([...filter]);
          set((state) => ({
            settings: withChannelSettings(state.settings, channel, {
              ...channelSettings(state.settings, channel),
              filter: values,
            }),
          }));
        },

        setFilterCoefficient: (channel, dx, dy, value) =>
          set((state) => {
            const current = channelSettings(state.settings, channel);
            return {
              settings: withChannelSettings(state.settings, channel, {
                ...current,
                filter: withCoefficient(current.filter, dx, dy, value),
              }),
            };
          }),

        setActivation: (channel, source) => {
          cache.get(source);
          set((state) => ({
            settings: withChannelSettings(state.settings, channel, {
              ...channelSettings(state.settings, channel),
              activation: source,
            }),
          }));
        },

        resetChannel: (channel) =>
          set((state) => ({
            settings: withChannelSettings(state.settings, channel, defaultChannelSettings(channel)),
          })),

        replaceSettings: (settings) => set({ settings: loadSettingsDocument(settings, cache) }),

        snapshot: () => snapshotFromSettings(get().settings, (source) => cache.get(source)),
      }),
      {
        name: options.storageKey ?? SETTINGS_STORAGE_KEY,
        storage: createJSONStorage(() => options.storage ?? window.localStorage),
        partialize: (state) => ({ settings: state.settings }),
        merge: (persisted, current) => {
          if (persisted === undefined) return current;
          const parsed = PersistedSettingsSchema.safeParse(persisted);
          if (!parsed.success) {
            console.warn("Discarding stored NCA settings:", parsed.error.issues[0]?.message);
            return current;
          }
          const { settings, replaced } = sanitizeSettings(parsed.data.settings, cache);
          if (replaced.length > 0) {
            console.warn(`Stored activation(s) for ${replaced.join(", ")} no longer compile; using defaults`);
          }
          return { ...current, settings };
        },
      },
    ),
  );
}
