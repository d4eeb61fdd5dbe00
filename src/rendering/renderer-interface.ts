import type { IGrid } from "../types/grid-types";
import type { Viewport } from "../utils/grid-utils";

export interface RendererOptions {
  width: number;
  height: number;
  stepTimeMs: number;
  actualStepsPerSecond: number;
}

export interface RendererMetrics {
  fps: number;
  sceneUpdateTimeMs: number;
  stepTimeMs: number;
  actualStepsPerSecond: number;
}

export interface Renderer {
  update(grid: IGrid, opts: RendererOptions): RendererMetrics;
  resize(width: number, height: number): void;
  /** Where the grid was last drawn, for mapping pointer positions back to cells. */
  viewport(): Viewport;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
