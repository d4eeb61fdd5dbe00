import {
  ActivationCache, DEFAULT_ACTIVATION_SOURCES, DEFAULT_ACTIVATIONS, compileActivation,
  type Activation, type ActivationSource,
} from "./activation";
import { CHANNEL_KEYS, type Channel, type ChannelTriple } from "./channels";
import { IDENTITY_FILTER, filterFromArray, filterToArray, type Filter } from "./filters";
import { NcaSettingsSchema, type ChannelSettings, type NcaSettings } from "./settings-schema";

/** Filters and activations as one step sees them. */
export interface ParameterSnapshot {
  readonly filters: ChannelTriple<Filter>;
  readonly activations: ChannelTriple<Activation>;
}

export const DEFAULT_PARAMETERS: ParameterSnapshot = {
  filters: [IDENTITY_FILTER, IDENTITY_FILTER, IDENTITY_FILTER],
  activations: DEFAULT_ACTIVATIONS,
};

export function defaultChannelSettings(channel: Channel): ChannelSettings {
  return {
    filter: filterToArray(IDENTITY_FILTER),
    activation: { ...DEFAULT_ACTIVATION_SOURCES[channel] },
  };
}

export function defaultSettings(): NcaSettings {
  return {
    red: defaultChannelSettings(0),
    green: defaultChannelSettings(1),
    blue: defaultChannelSettings(2),
  };
}

export function channelSettings(settings: NcaSettings, channel: Channel): ChannelSettings {
  return settings[CHANNEL_KEYS[channel]];
}

export function withChannelSettings(settings: NcaSettings, channel: Channel, next: ChannelSettings): NcaSettings {
  return { ...settings, [CHANNEL_KEYS[channel]]: next };
}

/**
 * Builds the parameters for one step from a settings document. Filters are
 * copied out of the settings, so later edits don't reach a snapshot already
 * handed to the engine.
 */
export function snapshotFromSettings(
  settings: NcaSettings,
  compile: (source: ActivationSource) => Activation = compileActivation,
): ParameterSnapshot {
  const { red, green, blue } = settings;
  return {
    filters: [filterFromArray(red.filter), filterFromArray(green.filter), filterFromArray(blue.filter)],
    activations: [compile(red.activation), compile(green.activation), compile(blue.activation)],
  };
}

/**
 * Replaces any channel whose activation no longer compiles with that channel's
 * defaults. Returns the fixed settings and the keys of the channels replaced.
 */
export function sanitizeSettings(
  settings: NcaSettings,
  cache: ActivationCache = new ActivationCache(),
): { settings: NcaSettings; replaced: string[] } {
  let result = settings;
  const replaced: string[] = [];
  ([0, 1, 2] as const).forEach((channel) => {
    try {
      cache.get(channelSettings(settings, channel).activation);
    } catch {
      result = withChannelSettings(result, channel, defaultChannelSettings(channel));
      replaced.push(CHANNEL_KEYS[channel]);
    }
  });
  return { settings: result, replaced };
}

/**
 * Validates a settings document from outside (a loaded file, the controls)
 * and resets channels whose activation doesn't compile, with a warning.
 * Throws a ZodError when the document isn't settings at all.
 */
export function loadSettingsDocument(input: unknown, cache: ActivationCache = new ActivationCache()): NcaSettings {
  const { settings, replaced } = sanitizeSettings(NcaSettingsSchema.parse(input), cache);
  if (replaced.length > 0) {
    console.warn(`Replaced invalid activation(s) for ${replaced.join(", ")} with defaults`);
  }
  return settings;
}
