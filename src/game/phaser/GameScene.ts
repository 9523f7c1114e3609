import Phaser from 'phaser';
import { createInitialGameState, idleInput, startNewRun, tickGame } from '../core/engine';
import { performanceMessage, progressStatus } from '../core/scoring';
import type { Enemy, GameConfig, GameEvent, GameState, TickResult } from '../core/types';
import type { KeyboardInput } from '../input/keyboard';
import type { ThemeConfig } from '../theme';

export type SceneBridge = {
  config: GameConfig;
  input: KeyboardInput;
  theme: ThemeConfig;
};

/** Draws the post-tick snapshot. Holds no game rules of its own. */
export class GameScene extends Phaser.Scene {
  private result!: TickResult;
  private bridge!: SceneBridge;
  private gfx!: Phaser.GameObjects.Graphics;
  private hudText!: Phaser.GameObjects.Text;
  private statusText!: Phaser.GameObjects.Text;
  private overlayText!: Phaser.GameObjects.Text;
  private floatTexts: Array<{ text: Phaser.GameObjects.Text; vy: number; ttl: number }> = [];
  private particles: Array<{ x: number; y: number; vx: number; vy: number; r: number; ttl: number; color: number }> = [];

  constructor() {
    super('GameScene');
  }

  init(data: { bridge: SceneBridge }) {
    this.bridge = data.bridge;
    const state = createInitialGameState(this.bridge.config);
    this.result = tickGame(state, idleInput, 0);
  }

  create() {
    const { theme } = this.bridge;
    this.cameras.main.setBackgroundColor(theme.background);
    this.gfx = this.add.graphics().setDepth(0);
    const style = { fontFamily: theme.hudFont, fontSize: '18px', color: '#ffffff', stroke: '#061622', strokeThickness: 3 };
    this.hudText = this.add.text(12, 10, '', style).setDepth(10);
    this.statusText = this.add.text(this.bridge.config.arena.width / 2, this.bridge.config.arena.height - 24, '', style)
      .setOrigin(0.5)
      .setDepth(10);
    this.overlayText = this.add.text(this.bridge.config.arena.width / 2, this.bridge.config.arena.height / 2, '', {
      ...style,
      fontSize: '30px',
      align: 'center',
    }).setOrigin(0.5).setDepth(20);
  }

  update(_time: number, delta: number) {
    let state: GameState = this.result.state;
    if (state.mode === 'gameOver' && this.bridge.input.consumeRestartPressed()) {
      state = startNewRun(state);
    }
    this.result = tickGame(state, this.bridge.input.readInput(), delta);
    if (this.result.events.length > 0) this.handleSceneEvents(this.result.events);
    this.renderState(delta);
  }

  private renderState(delta: number) {
    const { theme } = this.bridge;
    const r = this.result;
    this.gfx.clear();

    for (const pearl of r.pearls) {
      this.gfx.fillStyle(theme.pearlColor, 1);
      this.gfx.fillCircle(pearl.pos.x, pearl.pos.y, pearl.size / 2);
      this.gfx.fillStyle(0xffffff, 0.6);
      this.gfx.fillCircle(pearl.pos.x - pearl.size / 6, pearl.pos.y - pearl.size / 6, pearl.size / 6);
    }
    for (const powerUp of r.powerUps) {
      this.gfx.fillStyle(theme.powerUpColors[powerUp.kind], 0.9);
      this.gfx.fillRect(powerUp.pos.x - powerUp.size / 2, powerUp.pos.y - powerUp.size / 2, powerUp.size, powerUp.size);
    }
    for (const enemy of r.enemies) this.drawEnemy(enemy);
    for (const bullet of r.bullets) {
      this.gfx.lineStyle(2, theme.bulletColor, 0.9);
      this.gfx.strokeCircle(bullet.pos.x, bullet.pos.y, bullet.size / 2);
    }

    const { player } = r;
    const blink = player.invulnerableSeconds > 0 && Math.floor(player.invulnerableSeconds * 12) % 2 === 1;
    if (!blink) {
      const color = player.powerUps.shield > 0 ? theme.shieldedPlayerColor : theme.playerColor;
      this.drawFish(player.pos.x, player.pos.y, player.size / 2, color, player.direction);
    }

    this.updateFloatTexts(delta);
    this.updateParticles(delta);
    this.drawParticles();

    this.hudText.setText(`Score: ${r.score}   Level: ${r.level} (${r.zone})   Health: ${player.health}/${player.maxHealth}`);
    this.statusText.setText(progressStatus(r.score, r.level, r.enemies.length, this.bridge.config).text);
    if (r.mode === 'gameOver') {
      this.overlayText.setText(`GAME OVER\nFinal score: ${r.score}\nLevel reached: ${r.level}\n${performanceMessage(r.score)}\nENTER to play again`);
    } else if (r.mode === 'paused') {
      this.overlayText.setText('PAUSED');
    } else {
      this.overlayText.setText('');
    }
  }

  private drawEnemy(enemy: Enemy) {
    const color = this.bridge.theme.enemyColors[enemy.variant];
    const half = enemy.size / 2;
    switch (enemy.variant) {
      case 'jellyfish':
        this.gfx.fillStyle(color, 0.85);
        this.gfx.fillEllipse(enemy.pos.x, enemy.pos.y - half * 0.3, enemy.size, enemy.size * 0.7);
        this.gfx.lineStyle(2, color, 0.7);
        for (let i = -1; i <= 1; i += 1) {
          this.gfx.lineBetween(enemy.pos.x + i * half * 0.5, enemy.pos.y, enemy.pos.x + i * half * 0.5, enemy.pos.y + half);
        }
        return;
      case 'crab':
        this.gfx.fillStyle(color, 0.95);
        this.gfx.fillEllipse(enemy.pos.x, enemy.pos.y, enemy.size, enemy.size * 0.6);
        this.gfx.fillCircle(enemy.pos.x - half, enemy.pos.y - half * 0.5, half * 0.35);
        this.gfx.fillCircle(enemy.pos.x + half, enemy.pos.y - half * 0.5, half * 0.35);
        return;
      case 'shark':
        this.drawFish(enemy.pos.x, enemy.pos.y, half, color, enemy.vel.x < 0 ? -1 : 1);
        return;
    }
  }

  private drawFish(x: number, y: number, r: number, color: number, facing: 1 | -1) {
    this.gfx.fillStyle(color, 1);
    this.gfx.fillEllipse(x, y, r * 2.2, r * 1.35);
    this.gfx.fillTriangle(
      x - facing * (r * 1.2), y,
      x - facing * (r * 2.0), y - r * 0.8,
      x - facing * (r * 2.0), y + r * 0.8,
    );
    this.gfx.fillStyle(0x08243a, 1);
    this.gfx.fillCircle(x + facing * (r * 0.65), y - r * 0.22, Math.max(1.6, r * 0.16));
  }

  private handleSceneEvents(events: GameEvent[]) {
    const p = this.result.player.pos;
    for (const event of events) {
      if (event.type === 'pearl-collected') {
        this.spawnFloatingText(event.pos.x, event.pos.y - 10, `+${event.points}`, '#ffd38b');
        this.spawnBurst(event.pos.x, event.pos.y, 4, this.bridge.theme.pearlColor, 40);
      }
      if (event.type === 'enemy-defeated') {
        this.spawnFloatingText(event.pos.x, event.pos.y - 14, `+${event.points}`, '#ff9f9f');
        this.spawnBurst(event.pos.x, event.pos.y, 12, this.bridge.theme.enemyColors[event.variant], 80);
      }
      if (event.type === 'player-hit') this.spawnBurst(p.x, p.y, 10, 0xff7f6a, 70);
      if (event.type === 'level-advanced') this.spawnFloatingText(p.x, p.y - 40, `LEVEL ${event.level}`, '#9ae9ff');
      if (event.type === 'milestone') this.spawnFloatingText(p.x, p.y - 70, event.message, '#ffff66');
    }
  }

  private spawnFloatingText(x: number, y: number, value: string, color: string) {
    const text = this.add.text(x, y, value, {
      fontFamily: this.bridge.theme.hudFont,
      fontSize: '17px',
      fontStyle: '700',
      color,
      stroke: '#061622',
      strokeThickness: 4,
    }).setOrigin(0.5).setDepth(15);
    this.floatTexts.push({ text, vy: -28, ttl: 900 });
  }

  private updateFloatTexts(dt: number) {
    this.floatTexts = this.floatTexts.filter((f) => {
      f.ttl -= dt;
      f.text.y += (f.vy * dt) / 1000;
      f.text.setAlpha(Phaser.Math.Clamp(f.ttl / 900, 0, 1));
      if (f.ttl <= 0) {
        f.text.destroy();
        return false;
      }
      return true;
    });
  }

  private spawnBurst(x: number, y: number, count: number, color: number, speed: number) {
    for (let i = 0; i < count; i += 1) {
      const angle = Phaser.Math.FloatBetween(0, Math.PI * 2);
      const vel = Phaser.Math.FloatBetween(speed * 0.4, speed);
      this.particles.push({
        x,
        y,
        vx: Math.cos(angle) * vel,
        vy: Math.sin(angle) * vel,
        r: Phaser.Math.FloatBetween(1.4, 3.4),
        ttl: Phaser.Math.FloatBetween(180, 420),
        color,
      });
    }
  }

  private updateParticles(dt: number) {
    this.particles = this.particles.filter((p) => {
      p.ttl -= dt;
      p.x += (p.vx * dt) / 1000;
      p.y += (p.vy * dt) / 1000;
      p.vx *= 0.985;
      p.vy *= 0.985;
      return p.ttl > 0;
    });
  }

  private drawParticles() {
    for (const p of this.particles) {
      this.gfx.fillStyle(p.color, Phaser.Math.Clamp(p.ttl / 420, 0, 1) * 0.9);
      this.gfx.fillCircle(p.x, p.y, p.r);
    }
  }
}
