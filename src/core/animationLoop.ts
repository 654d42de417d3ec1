/**
 * Callback function called each frame
 * @param deltaTime - Seconds since the previous frame, 0 on the first
 * @param totalTime - Seconds since the loop started
 */
export type FrameCallback = (deltaTime: number, totalTime: number) => void;

/**
 * Callback function called with FPS count
 * @param fps - Frames per second
 */
export type FpsCallback = (fps: number) => void;

/** Frame scheduling pair; requestAnimationFrame and cancelAnimationFrame by default */
export interface FrameScheduler {
  request(callback: (timeMs: number) => void): number;
  cancel(id: number): void;
}

/**
 * Options for creating an animation loop
 */
export interface AnimationLoopOptions {
  /** Callback called each second with the FPS count */
  onFps?: FpsCallback | null;
  scheduler?: FrameScheduler;
}

/**
 * Animation loop interface
 */
export interface AnimationLoop {
  /** Start the animation loop with a frame callback */
  start(callback: FrameCallback): void;
  /** Stop the animation loop */
  stop(): void;
  /** Check if the loop is currently running */
  isRunning(): boolean;
}

const browserScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (id) => cancelAnimationFrame(id),
};

/**
 * Animation loop manager - schedules frames, measures delta time and counts FPS
 */
export function createAnimationLoop(options: AnimationLoopOptions = {}): AnimationLoop {
  const { onFps = null, scheduler = browserScheduler } = options;

  let animationId: number | null = null;
  let startTime: number | null = null;
  let lastTime = 0;
  let frameCallback: FrameCallback | null = null;

  // FPS tracking
  let frameCount = 0;
  let fpsLastTime = 0;

  function tick(time: number): void {
    if (startTime === null) {
      startTime = time;
      lastTime = time;
      fpsLastTime = time;
    }

    const deltaTime = (time - lastTime) / 1000;
    lastTime = time;

    frameCount++;
    if (time - fpsLastTime >= 1000) {
      onFps?.(frameCount);
      frameCount = 0;
      fpsLastTime = time;
    }

    frameCallback?.(deltaTime, (time - startTime) / 1000);

    // The callback may have stopped the loop
    if (animationId !== null) {
      animationId = scheduler.request(tick);
    }
  }

  return {
    start(callback: FrameCallback): void {
      frameCallback = callback;
      if (animationId === null) {
        startTime = null;
        frameCount = 0;
        animationId = scheduler.request(tick);
      }
    },

    stop(): void {
      if (animationId !== null) {
        scheduler.cancel(animationId);
        animationId = null;
        frameCallback = null;
      }
    },

    isRunning(): boolean {
      return animationId !== null;
    },
  };
}
