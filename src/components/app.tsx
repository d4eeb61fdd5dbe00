import React, { useState, useEffect, useRef, useCallback } from "react";
import { SimulationCanvas, type BrushSettings } from "./simulation-canvas";
import { ChannelControls } from "./channel-controls";
import { createParameterStore, type ParameterStore } from "../simulation/parameter-store";
import { createPresetStore, type PresetStore } from "../simulation/preset-store";
import { BRUSH_SHAPES } from "../simulation/brush";
import { CHANNELS } from "../simulation/channels";
import {
  DEFAULT_STEPS_PER_SECOND, DEFAULT_BRUSH_RADIUS, DEFAULT_BRUSH_COLOR, MAX_BRUSH_RADIUS, SPEED_OPTIONS,
} from "../constants";
import type { RendererMetrics } from "../rendering/renderer-interface";
import { hexToRgb, rgbToHex } from "../utils/color-utils";

interface Props {
  /** Defaults to a store persisted in localStorage. */
  parameterStore?: ParameterStore;
  presetStore?: PresetStore;
}

export const App: React.FC<Props> = (props) => {
  const [parameterStore] = useState(() => props.parameterStore ?? createParameterStore());
  const [presetStore] = useState(() => props.presetStore ?? createPresetStore());
  const [targetStepsPerSecond, setTargetStepsPerSecond] = useState(DEFAULT_STEPS_PER_SECOND);
  const [paused, setPaused] = useState(false);
  const [brush, setBrush] = useState<BrushSettings>({
    radius: DEFAULT_BRUSH_RADIUS,
    shape: "circle",
    color: DEFAULT_BRUSH_COLOR,
  });
  const [resetToken, setResetToken] = useState(0);
  const [stepToken, setStepToken] = useState(0);
  const [metrics, setMetrics] = useState<RendererMetrics | null>(null);

  const controlsRef = useRef<HTMLDivElement>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const updateCanvasSize = useCallback(() => {
    const controlsHeight = controlsRef.current?.offsetHeight ?? 0;
    setCanvasSize({
      width: window.innerWidth,
      height: Math.max(0, window.innerHeight - controlsHeight),
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  // Build performance metrics string
  const perfParts: string[] = [];
  if (metrics) {
    const fps = metrics.fps;
    const frameMs = fps > 0 ? 1000 / fps : 0;
    const stepPct = frameMs > 0 ? (metrics.stepTimeMs / frameMs * 100).toFixed(0) : "0";
    const drawPct = frameMs > 0 ? (metrics.sceneUpdateTimeMs / frameMs * 100).toFixed(0) : "0";
    perfParts.push(`${Math.round(fps)} fps`);
    perfParts.push(`${Math.round(metrics.actualStepsPerSecond)} steps/s`);
    perfParts.push(`step ${metrics.stepTimeMs.toFixed(1)}ms (${stepPct}%)`);
    perfParts.push(`draw ${metrics.sceneUpdateTimeMs.toFixed(1)}ms (${drawPct}%)`);
  }

  return (
    <div className="app">
      <div className="controls" ref={controlsRef}>
        <button onClick={() => setPaused(p => !p)}>{paused ? "Play" : "Pause"}</button>
        <button onClick={() => setStepToken(t => t + 1)} disabled={!paused}>Step</button>
        <button onClick={() => setResetToken(t => t + 1)}>Reinitialize</button>
        <label>
          Speed: {targetStepsPerSecond} steps/s
          <select value={targetStepsPerSecond} onChange={e => setTargetStepsPerSecond(Number(e.target.value))}>
            {SPEED_OPTIONS.map(s => <option key={s} value={s}>{s} steps/s</option>)}
          </select>
        </label>
        <label>
          Brush radius: {brush.radius > 0 ? brush.radius : "off"}
          <input type="range" min="0" max={MAX_BRUSH_RADIUS} step="1" value={brush.radius}
            onChange={e => setBrush(b => ({ ...b, radius: Number(e.target.value) }))} />
        </label>
        <label>
          Brush shape:
          <select value={brush.shape} onChange={e => {
            const shape = BRUSH_SHAPES.find(s => s === e.target.value);
            if (shape) setBrush(b => ({ ...b, shape }));
          }}>
            {BRUSH_SHAPES.map(s => <option key={s} value={s}>{s}</option>)}
          </select>
        </label>
        <label>
          Brush color:
          <input type="color" value={rgbToHex(brush.color)} onChange={e => {
            const color = hexToRgb(e.target.value);
            if (color) setBrush(b => ({ ...b, color }));
          }} />
        </label>
        <div className="channels">
          {CHANNELS.map(channel => (
            <ChannelControls key={channel} channel={channel}
              parameterStore={parameterStore} presetStore={presetStore} />
          ))}
        </div>
      </div>
      <div className="canvas-container">
        <SimulationCanvas
          width={canvasSize.width}
          height={canvasSize.height}
          parameterStore={parameterStore}
          targetStepsPerSecond={targetStepsPerSecond}
          paused={paused}
          brush={brush}
          resetToken={resetToken}
          stepToken={stepToken}
          onMetrics={setMetrics}
        />
        <div className="legend-overlay">
          {perfParts.length > 0 && <div>{perfParts.join(" | ")}</div>}
        </div>
      </div>
    </div>
  );
};
