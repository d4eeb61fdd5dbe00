import React, { useRef, useEffect } from "react";
import { createGridRenderer } from "../rendering/grid-renderer";
import type { Renderer, RendererMetrics } from "../rendering/renderer-interface";
import { NcaEngine } from "../simulation/nca-engine";
import { SimulationStepper } from "../simulation/simulation-stepper";
import { StrokeTracker } from "../simulation/stroke-tracker";
import type { BrushShape } from "../simulation/brush";
import type { RGB } from "../simulation/grid";
import type { ParameterStore } from "../simulation/parameter-store";
import { GRID_WIDTH, GRID_HEIGHT, TARGET_FPS } from "../constants";
import { canvasToGrid } from "../utils/grid-utils";

export interface BrushSettings {
  radius: number;
  shape: BrushShape;
  color: RGB;
}

interface Props {
  width: number;
  height: number;
  parameterStore: ParameterStore;
  targetStepsPerSecond: number;
  paused: boolean;
  brush: BrushSettings;
  /** Changing this value re-seeds the grid. */
  resetToken: number;
  /** Changing this value runs exactly one step. */
  stepToken: number;
  onMetrics?: (metrics: RendererMetrics) => void;
}

export const SimulationCanvas: React.FC<Props> = ({
  width, height, parameterStore, targetStepsPerSecond, paused, brush, resetToken, stepToken, onMetrics,
}) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const parameterStoreRef = useRef(parameterStore);
  parameterStoreRef.current = parameterStore;
  const engineRef = useRef<NcaEngine | null>(null);
  if (engineRef.current === null) {
    engineRef.current = new NcaEngine({
      width: GRID_WIDTH,
      height: GRID_HEIGHT,
      getParameters: () => parameterStoreRef.current.getState().snapshot(),
    });
  }
  const stepperRef = useRef<SimulationStepper | null>(null);
  const trackerRef = useRef(new StrokeTracker());
  const targetStepsPerSecondRef = useRef(targetStepsPerSecond);
  targetStepsPerSecondRef.current = targetStepsPerSecond;
  const pausedRef = useRef(paused);
  pausedRef.current = paused;
  const brushRef = useRef(brush);
  brushRef.current = brush;
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const onMetricsRef = useRef(onMetrics);
  onMetricsRef.current = onMetrics;

  // Set when the grid changed outside the stepper (reset), so a paused loop still redraws.
  const dirtyRef = useRef(true);

  // Increments on every React render (i.e., whenever any prop changes).
  // The rAF loop compares this against lastRenderedVersion to skip redundant
  // renders when paused.
  const renderVersionRef = useRef(0);
  renderVersionRef.current += 1;

  useEffect(() => {
    const container = containerRef.current;
    const engine = engineRef.current;
    if (!container || !engine) return;

    let destroyed = false;
    let rafId = 0;
    const stepper = new SimulationStepper(() => engine.step());
    stepperRef.current = stepper;

    function startRafLoop(renderer: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't cause
      // occasional double-interval frames when elapsed ≈ 1000/TARGET_FPS.
      const minFrameInterval = 1000 / TARGET_FPS - 1;
      let lastFrameTime = -1;
      let lastRenderedVersion = -1;

      function tick(timestamp: number): void {
        if (destroyed || !engine) return;

        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        // Frame rate capping: skip if not enough time has passed
        const elapsed = timestamp - lastFrameTime;
        if (elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(tick);
          return;
        }
        lastFrameTime = timestamp;

        const fps = elapsed > 0 ? 1000 / elapsed : 0;

        stepper.paused = pausedRef.current;
        stepper.targetStepsPerSecond = targetStepsPerSecondRef.current;
        stepper.advance(elapsed);

        // Strokes still land while paused; running steps apply them first.
        const painted = engine.applyPendingStrokes();

        const propsChanged = renderVersionRef.current !== lastRenderedVersion;
        const gridChanged = painted > 0 || stepper.lastStepsThisFrame > 0 || dirtyRef.current;
        if (pausedRef.current && !propsChanged && !gridChanged) {
          rafId = requestAnimationFrame(tick);
          return;
        }

        const metrics = renderer.update(engine.current, {
          width: sizeRef.current.width,
          height: sizeRef.current.height,
          stepTimeMs: stepper.stepTimeMs,
          actualStepsPerSecond: stepper.actualStepsPerSecond,
        });
        lastRenderedVersion = renderVersionRef.current;
        dirtyRef.current = false;

        metrics.fps = fps;
        onMetricsRef.current?.(metrics);

        rafId = requestAnimationFrame(tick);
      }

      rafId = requestAnimationFrame(tick);
    }

    (async () => {
      const canvas = document.createElement("canvas");
      container.appendChild(canvas);
      const renderer = await createGridRenderer(
        canvas, sizeRef.current.width, sizeRef.current.height, engine.buffers.width, engine.buffers.height);

      if (destroyed) {
        renderer.destroy();
        return;
      }

      rendererRef.current = renderer;
      renderer.resize(sizeRef.current.width, sizeRef.current.height);
      startRafLoop(renderer);
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);
      stepperRef.current = null;
      rendererRef.current?.destroy();
      rendererRef.current = null;
      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  }, []);

  // Re-seed when asked; skip the initial mount, the engine seeds itself
  const lastResetTokenRef = useRef(resetToken);
  useEffect(() => {
    if (resetToken === lastResetTokenRef.current) return;
    lastResetTokenRef.current = resetToken;
    engineRef.current?.reset();
    trackerRef.current.release();
    console.info("Reinitialized grid");
    dirtyRef.current = true;
  }, [resetToken]);

  const lastStepTokenRef = useRef(stepToken);
  useEffect(() => {
    if (stepToken === lastStepTokenRef.current) return;
    lastStepTokenRef.current = stepToken;
    stepperRef.current?.requestStep();
  }, [stepToken]);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
  }, [width, height]);

  function handlePointer(e: React.PointerEvent<HTMLDivElement>, active: boolean): void {
    const renderer = rendererRef.current;
    const engine = engineRef.current;
    if (!renderer || !engine) return;
    const rect = renderer.canvas.getBoundingClientRect();
    const position = canvasToGrid(e.clientX - rect.left, e.clientY - rect.top, renderer.viewport());
    const segment = trackerRef.current.sample(position, active);
    if (!segment) return;
    const { radius, shape, color } = brushRef.current;
    engine.queueStroke({ ...segment, radius, shape, color });
  }

  return (
    <div
      ref={containerRef}
      style={{ touchAction: "none" }}
      onPointerDown={(e) => {
        e.currentTarget.setPointerCapture(e.pointerId);
        handlePointer(e, true);
      }}
      onPointerMove={(e) => handlePointer(e, trackerRef.current.isDrawing)}
      onPointerUp={() => trackerRef.current.release()}
      onPointerCancel={() => trackerRef.current.release()}
    />
  );
};
