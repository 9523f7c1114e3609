import Phaser from 'phaser';
import { createGameConfig } from './game/core/config';
import { KeyboardInput } from './game/input/keyboard';
import { GameScene, type SceneBridge } from './game/phaser/GameScene';
import { reefTheme } from './game/theme';

const host = document.getElementById('root');
if (!host) throw new Error('Missing #root element for the game canvas');

const config = createGameConfig();
const bridge: SceneBridge = {
  config,
  input: new KeyboardInput(window),
  theme: reefTheme,
};

const game = new Phaser.Game({
  type: Phaser.AUTO,
  parent: host,
  width: config.arena.width,
  height: config.arena.height,
  backgroundColor: reefTheme.background,
  scale: {
    mode: Phaser.Scale.FIT,
    autoCenter: Phaser.Scale.CENTER_BOTH,
  },
  audio: { noAudio: true },
  fps: { target: config.referenceFps, forceSetTimeOut: true },
});
game.scene.add('GameScene', GameScene, true, { bridge });

window.addEventListener('beforeunload', () => {
  bridge.input.destroy();
  game.destroy(true);
});
