import { z } from "zod";
import { BUILTIN_ACTIVATION_NAMES } from "./activation";
import { FILTER_SIZE } from "./filters";

/** Nine filter coefficients in filterIndex() order. */
export const FilterValuesSchema = z.array(z.number()).length(FILTER_SIZE);

export const ActivationSourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("builtin"), name: z.enum(BUILTIN_ACTIVATION_NAMES) }),
  z.object({ kind: z.literal("expression"), expression: z.string() }),
]);

export const ChannelSettingsSchema = z.object({
  filter: FilterValuesSchema,
  activation: ActivationSourceSchema,
});
export type ChannelSettings = z.infer<typeof ChannelSettingsSchema>;

export const NcaSettingsSchema = z.object({
  red: ChannelSettingsSchema,
  green: ChannelSettingsSchema,
  blue: ChannelSettingsSchema,
});
export type NcaSettings = z.infer<typeof NcaSettingsSchema>;

const PresetNameSchema = z.string().trim().min(1);

export const FilterPresetSchema = z.object({
  name: PresetNameSchema,
  filter: FilterValuesSchema,
});
export type FilterPreset = z.infer<typeof FilterPresetSchema>;

export const ActivationPresetSchema = z.object({
  name: PresetNameSchema,
  activation: ActivationSourceSchema,
});
export type ActivationPreset = z.infer<typeof ActivationPresetSchema>;

export const PresetsSchema = z.object({
  filterPresets: z.array(FilterPresetSchema),
  activationPresets: z.array(ActivationPresetSchema),
});
