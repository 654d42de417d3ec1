import sceneJson from '../config/scene.json';
import { parseSceneConfig } from './core/config/sceneConfig';
import { errorMessage } from './core/errors';
import { TabletopDemo } from './demos/tabletop/TabletopDemo';

async function main(): Promise<void> {
  const canvas = document.querySelector<HTMLCanvasElement>('#scene');
  if (!canvas) {
    throw new Error('[main] Missing #scene canvas');
  }
  const fpsLabel = document.querySelector<HTMLElement>('#fps');

  const config = parseSceneConfig(sceneJson, 'config/scene.json');
  const demo = await TabletopDemo.create(canvas, {
    config,
    onFps: (fps) => {
      if (fpsLabel) fpsLabel.textContent = `${fps} fps`;
    },
  });

  window.addEventListener('beforeunload', () => demo.destroy());
  demo.start();
}

main().catch((error: unknown) => {
  console.error('[main] Failed to start the tabletop demo:', error);
  const status = document.querySelector<HTMLElement>('#status');
  if (status) {
    status.textContent = errorMessage(error);
  }
});
