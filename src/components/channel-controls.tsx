import React, { useState } from "react";
import { useStore } from "zustand";
import { ZodError } from "zod";
import {
  BUILTIN_ACTIVATION_NAMES, BUILTIN_ACTIVATION_LABELS, isBuiltinActivationName, type ActivationSource,
} from "../simulation/activation";
import { CHANNEL_KEYS, type Channel } from "../simulation/channels";
import { ActivationCompileError } from "../simulation/errors";
import { filterIndex } from "../simulation/filters";
import { channelSettings } from "../simulation/parameters";
import type { ParameterStore } from "../simulation/parameter-store";
import type { PresetStore } from "../simulation/preset-store";
import { FILTER_INPUT_STEP } from "../constants";

const OFFSETS = [-1, 0, 1];
const EXPRESSION_OPTION = "expression";

interface Props {
  channel: Channel;
  parameterStore: ParameterStore;
  presetStore: PresetStore;
}

/** Message for errors a user can cause from the controls; anything else is rethrown. */
function userErrorMessage(err: unknown): string {
  if (err instanceof ActivationCompileError) return err.message;
  if (err instanceof ZodError) return err.issues[0]?.message ?? "Invalid value";
  throw err;
}

/** Filter grid, activation picker and presets for one color channel. */
export const ChannelControls: React.FC<Props> = ({ channel, parameterStore, presetStore }) => {
  const settings = useStore(parameterStore, (s) => channelSettings(s.settings, channel));
  const setFilterCoefficient = useStore(parameterStore, (s) => s.setFilterCoefficient);
  const setFilter = useStore(parameterStore, (s) => s.setFilter);
  const setActivation = useStore(parameterStore, (s) => s.setActivation);
  const resetChannel = useStore(parameterStore, (s) => s.resetChannel);
  const filterPresets = useStore(presetStore, (s) => s.filterPresets);
  const activationPresets = useStore(presetStore, (s) => s.activationPresets);

  const { activation } = settings;
  const [editingExpression, setEditingExpression] = useState(activation.kind === "expression");
  const [draft, setDraft] = useState(activation.kind === "expression" ? activation.expression : "x");
  const [presetName, setPresetName] = useState("");
  const [error, setError] = useState<string | null>(null);

  const label = CHANNEL_KEYS[channel];
  const selected = editingExpression || activation.kind === "expression" ? EXPRESSION_OPTION : activation.name;

  function attempt(action: () => void): void {
    try {
      action();
      setError(null);
    } catch (err) {
      setError(userErrorMessage(err));
    }
  }

  function applySource(source: ActivationSource): void {
    attempt(() => setActivation(channel, source));
  }

  return (
    <fieldset className="channel-controls" data-testid={`channel-${label}`}>
      <legend>{label}</legend>
      <table className="filter-grid">
        <tbody>
          {OFFSETS.map((dy) => (
            <tr key={dy}>
              {OFFSETS.map((dx) => (
                <td key={dx}>
                  <input
                    type="number"
                    step={FILTER_INPUT_STEP}
                    aria-label={`${label} filter ${dx},${dy}`}
                    value={settings.filter[filterIndex(dx, dy)]}
                    onChange={(e) => {
                      const value = Number(e.target.value);
                      if (e.target.value !== "" && Number.isFinite(value)) {
                        setFilterCoefficient(channel, dx, dy, value);
                      }
                    }}
                  />
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      <label>
        Activation:
        <select
          aria-label={`${label} activation`}
          value={selected}
          onChange={(e) => {
            const value = e.target.value;
            if (isBuiltinActivationName(value)) {
              setEditingExpression(false);
              applySource({ kind: "builtin", name: value });
            } else {
              setEditingExpression(true);
            }
          }}
        >
          {BUILTIN_ACTIVATION_NAMES.map((name) => (
            <option key={name} value={name}>{BUILTIN_ACTIVATION_LABELS[name]}</option>
          ))}
          <option value={EXPRESSION_OPTION}>Custom f(x)</option>
        </select>
      </label>
      {selected === EXPRESSION_OPTION && (
        <span>
          <input
            type="text"
            aria-label={`${label} expression`}
            value={draft}
            onChange={(e) => setDraft(e.target.value)}
          />
          <button onClick={() => applySource({ kind: "expression", expression: draft })}>Apply</button>
        </span>
      )}
      <button onClick={() => {
        resetChannel(channel);
        setEditingExpression(false);
        setError(null);
      }}>Reset {label}</button>
      <div className="presets">
        <select
          aria-label={`${label} filter preset`}
          value=""
          onChange={(e) => {
            const preset = filterPresets.find((p) => p.name === e.target.value);
            if (preset) attempt(() => setFilter(channel, preset.filter));
          }}
        >
          <option value="">Load filter…</option>
          {filterPresets.map((p) => <option key={p.name} value={p.name}>{p.name}</option>)}
        </select>
        <select
          aria-label={`${label} activation preset`}
          value=""
          onChange={(e) => {
            const preset = activationPresets.find((p) => p.name === e.target.value);
            if (!preset) return;
            setEditingExpression(preset.activation.kind === "expression");
            if (preset.activation.kind === "expression") setDraft(preset.activation.expression);
            applySource(preset.activation);
          }}
        >
          <option value="">Load activation…</option>
          {activationPresets.map((p) => <option key={p.name} value={p.name}>{p.name}</option>)}
        </select>
        <input
          type="text"
          aria-label={`${label} preset name`}
          placeholder="Preset name"
          value={presetName}
          onChange={(e) => setPresetName(e.target.value)}
        />
        <button onClick={() => attempt(() => presetStore.getState().addFilterPreset(presetName, settings.filter))}>
          Save filter
        </button>
        <button onClick={() => attempt(() => presetStore.getState().addActivationPreset(presetName, activation))}>
          Save activation
        </button>
      </div>
      {error && <div className="error" role="alert">{error}</div>}
    </fieldset>
  );
};
