import { DEFAULT_STEPS_PER_SECOND, MAX_STEPS_PER_FRAME } from "../constants";

/**
 * Runs the automaton at a target steps-per-second rate, independent of frame
 * rate. Tracks performance metrics.
 */
export class SimulationStepper {
  targetStepsPerSecond = DEFAULT_STEPS_PER_SECOND;
  paused = false;
  /** Steps beyond this in one frame are dropped rather than carried over. */
  maxStepsPerFrame = MAX_STEPS_PER_FRAME;

  /** EMA-smoothed actual steps per second. */
  actualStepsPerSecond = 0;

  /** EMA-smoothed time spent in step() calls per frame, in ms. */
  stepTimeMs = 0;

  /** Steps run by the most recent advance(). */
  lastStepsThisFrame = 0;

  private accumulator = 0;
  private singleStepRequested = false;
  private readonly stepFn: () => void;

  /** EMA smoothing factor — ~0.05 at 30fps gives a ~660ms time constant. */
  private readonly emaAlpha = 0.05;

  constructor(stepFn: () => void) {
    this.stepFn = stepFn;
  }

  /** Runs exactly one step on the next advance(), even while paused. */
  requestStep(): void {
    this.singleStepRequested = true;
  }

  /**
   * Called once per frame. Determines how many steps to run based on
   * elapsed time and the target rate, then executes them.
   *
   * @param deltaMs — milliseconds since the last frame
   */
  advance(deltaMs: number): void {
    let stepsThisFrame = 0;

    if (this.paused) {
      this.accumulator = 0;
    } else if (deltaMs > 0) {
      this.accumulator += this.targetStepsPerSecond * deltaMs / 1000;
      stepsThisFrame = Math.floor(this.accumulator);
      this.accumulator -= stepsThisFrame;
      if (stepsThisFrame > this.maxStepsPerFrame) {
        stepsThisFrame = this.maxStepsPerFrame;
      }
    }
    if (stepsThisFrame === 0 && this.singleStepRequested) stepsThisFrame = 1;
    this.singleStepRequested = false;
    this.lastStepsThisFrame = stepsThisFrame;

    const t0 = performance.now();
    for (let i = 0; i < stepsThisFrame; i++) {
      this.stepFn();
    }
    const rawStepTimeMs = performance.now() - t0;

    if (this.paused) {
      this.stepTimeMs = 0;
      // Keep the last actualStepsPerSecond frozen while paused
      return;
    }
    if (deltaMs <= 0) return;

    this.stepTimeMs =
      this.emaAlpha * rawStepTimeMs +
      (1 - this.emaAlpha) * this.stepTimeMs;

    const instantStepsPerSecond = stepsThisFrame / (deltaMs / 1000);
    this.actualStepsPerSecond =
      this.emaAlpha * instantStepsPerSecond +
      (1 - this.emaAlpha) * this.actualStepsPerSecond;
  }
}
