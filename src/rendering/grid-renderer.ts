import { Application, BufferImageSource, Sprite, Texture } from "pixi.js";
import { BACKGROUND_COLOR } from "../constants";
import type { IGrid } from "../types/grid-types";
import { gridToRGBA8 } from "../utils/color-utils";
import { computeViewport, type Viewport } from "../utils/grid-utils";
import type { Renderer, RendererMetrics, RendererOptions } from "./renderer-interface";

/**
 * Draws the grid as a single nearest-neighbour scaled texture, letterboxed
 * into the canvas. The texture's pixel buffer is rewritten in place on every
 * update.
 */
export async function createGridRenderer(canvas: HTMLCanvasElement, width: number, height: number,
    gridWidth: number, gridHeight: number): Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: BACKGROUND_COLOR });
  app.ticker.stop();

  const pixels = new Uint8Array(gridWidth * gridHeight * 4);
  const source = new BufferImageSource({
    resource: pixels,
    width: gridWidth,
    height: gridHeight,
    format: "rgba8unorm",
    scaleMode: "nearest",
  });
  const texture = new Texture({ source });
  const sprite = new Sprite(texture);
  app.stage.addChild(sprite);

  let view: Viewport = computeViewport(width, height, gridWidth, gridHeight);

  // Scene-update timing tracked internally via EMA
  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  function update(grid: IGrid, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();

    gridToRGBA8(grid, pixels);
    source.update();

    view = computeViewport(opts.width, opts.height, grid.width, grid.height);
    sprite.position.set(view.x, view.y);
    sprite.scale.set(view.scale);
    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return {
      fps: 0,
      sceneUpdateTimeMs,
      stepTimeMs: opts.stepTimeMs,
      actualStepsPerSecond: opts.actualStepsPerSecond,
    };
  }

  return {
    canvas: app.canvas as unknown as HTMLCanvasElement,
    update,
    viewport: () => view,
    resize(w: number, h: number) {
      app.renderer.resize(w, h);
      view = computeViewport(w, h, gridWidth, gridHeight);
    },
    destroy() {
      texture.destroy(true);
      app.destroy();
    },
  };
}
