import Phaser from 'phaser';
import { EXIT_CONTROL, WINDOW } from '../core/config';
import { createCountdown, stepCountdown } from '../core/countdown';
import { createSession, stepSession, summarizeSession } from '../core/engine';
import type { CountdownState, GameEvent, PhaseOutcome, SessionConfig, SessionState, SessionSummary, Size } from '../core/types';
import type { InputQueue } from '../input/queue';
import { createLogger } from '../log';
import { buildCountdownFrame, buildSessionFrame, type DrawOp, type TextStyle } from '../render/frame';
import { resolveSkin, resolveTheme, textureKeys, type ThemeConfig, type ThemeSkin } from '../theme';

const log = createLogger('scene');

export type SceneBridge = {
  getConfig: () => SessionConfig;
  inputs: InputQueue;
  onEvents: (events: readonly GameEvent[]) => void;
  onSessionStarted: (skin: ThemeSkin) => void;
  onPhaseEnded: (outcome: PhaseOutcome, summary: SessionSummary | null) => void;
};

type Phase =
  | { kind: 'countdown'; state: CountdownState }
  | { kind: 'session'; state: SessionState }
  | { kind: 'ended' };

const TEXT_STYLES: Record<TextStyle, Phaser.Types.GameObjects.Text.TextStyle> = {
  hud: { fontFamily: 'Arial, Helvetica, sans-serif', fontSize: '28px' },
  label: { fontFamily: 'Arial, Helvetica, sans-serif', fontSize: '22px' },
  title: { fontFamily: 'Arial, Helvetica, sans-serif', fontSize: '48px' },
  countdown: { fontFamily: 'Arial, Helvetica, sans-serif', fontSize: '96px', fontStyle: 'bold' },
};

const TEXT_STYLE_KEYS: readonly TextStyle[] = ['hud', 'label', 'title', 'countdown'];

/**
 * Runs countdown then session on Phaser's frame loop. Each frame samples the clock once, steps
 * the core with the queued inputs, then draws the frame ops; drawing never touches core state.
 */
export class GameScene extends Phaser.Scene {
  private bridge!: SceneBridge;
  private theme!: ThemeConfig;
  private skin!: ThemeSkin;
  private exitLabelSize: Size = EXIT_CONTROL.estimatedLabelSize;
  private phase: Phase = { kind: 'ended' };
  private graphicsPool: Phaser.GameObjects.Graphics[] = [];
  private imagePool: Phaser.GameObjects.Image[] = [];
  private textPools: Record<TextStyle, Phaser.GameObjects.Text[]> = { hud: [], label: [], title: [], countdown: [] };

  constructor() {
    super('GameScene');
  }

  init(data: { bridge: SceneBridge }) {
    this.bridge = data.bridge;
    this.theme = resolveTheme(this.bridge.getConfig().theme);
    this.phase = { kind: 'ended' };
  }

  preload() {
    const keys = textureKeys(this.theme);
    this.load.on(Phaser.Loader.Events.FILE_LOAD_ERROR, (file: Phaser.Loader.File) => {
      log.warn(`asset ${file.key} failed to load from ${String(file.url)}, drawing its fallback`);
    });
    if (this.theme.background.image) this.load.image(keys.background, this.theme.background.image);
    if (this.theme.sprites.target) this.load.image(keys.target, this.theme.sprites.target);
    if (this.theme.sprites.hideout) this.load.image(keys.hideout, this.theme.sprites.hideout);
  }

  create() {
    this.skin = resolveSkin(this.theme, (key) => this.textures.exists(key));
    log.debug(`skin ${this.skin.key}`, this.skin);

    const probe = this.add.text(0, 0, EXIT_CONTROL.label, TEXT_STYLES.hud);
    this.exitLabelSize = { width: probe.width, height: probe.height };
    probe.destroy();

    this.input.on(Phaser.Input.Events.POINTER_DOWN, (pointer: Phaser.Input.Pointer) => {
      if (pointer.button !== 0) return;
      this.bridge.inputs.push({ type: 'press', pos: { x: pointer.x, y: pointer.y } });
    });

    this.bridge.inputs.clear();
    this.phase = { kind: 'countdown', state: createCountdown() };
    this.bridge.onEvents(this.phase.state.pendingEvents);
  }

  update(time: number) {
    const now = time;
    const inputs = this.bridge.inputs.drain();
    const phase = this.phase;

    if (phase.kind === 'countdown') {
      const state = stepCountdown(phase.state, inputs, now);
      this.emit(state.pendingEvents);
      if (state.outcome) {
        this.end(state.outcome, null);
        return;
      }
      if (state.done) {
        const session = createSession(this.bridge.getConfig(), now, { exitLabelSize: this.exitLabelSize });
        this.phase = { kind: 'session', state: session };
        this.bridge.onSessionStarted(this.skin);
        this.draw(buildSessionFrame(session, this.skin));
        return;
      }
      this.phase = { kind: 'countdown', state };
      this.draw(buildCountdownFrame({ numeral: state.numeral, skin: this.skin }));
      return;
    }

    if (phase.kind === 'session') {
      const state = stepSession(phase.state, inputs, now);
      this.emit(state.pendingEvents);
      if (state.outcome) {
        this.end(state.outcome, summarizeSession(state));
        return;
      }
      this.phase = { kind: 'session', state };
      this.draw(buildSessionFrame(state, this.skin));
    }
  }

  private emit(events: readonly GameEvent[]) {
    if (events.length > 0) this.bridge.onEvents(events);
  }

  private end(outcome: PhaseOutcome, summary: SessionSummary | null) {
    this.phase = { kind: 'ended' };
    log.info(`phase ended: ${outcome}`, summary);
    this.bridge.onPhaseEnded(outcome, summary);
  }

  private draw(ops: readonly DrawOp[]) {
    let graphics = 0;
    let images = 0;
    const texts: Record<TextStyle, number> = { hud: 0, label: 0, title: 0, countdown: 0 };
    ops.forEach((op, depth) => {
      switch (op.kind) {
        case 'background':
          if (op.visual.kind === 'image') {
            this.nextImage(images++, op.visual.textureKey, depth)
              .setOrigin(0)
              .setPosition(0, 0)
              .setDisplaySize(WINDOW.width, WINDOW.height);
          } else {
            const g = this.nextGraphics(graphics++, depth);
            g.fillGradientStyle(op.visual.top, op.visual.top, op.visual.bottom, op.visual.bottom, 1);
            g.fillRect(0, 0, WINDOW.width, WINDOW.height);
          }
          break;
        case 'hideout':
        case 'target': {
          // Hideouts sit slightly wider than the target that pops out of them.
          const pad = op.kind === 'hideout' ? 8 : 0;
          if (op.visual.kind === 'sprite') {
            const size = (op.radius + pad) * 2;
            this.nextImage(images++, op.visual.textureKey, depth)
              .setOrigin(0.5)
              .setPosition(op.pos.x, op.pos.y)
              .setDisplaySize(size, size);
          } else {
            const g = this.nextGraphics(graphics++, depth);
            g.fillStyle(op.visual.color, 1);
            g.fillCircle(op.pos.x, op.pos.y, op.radius + pad);
          }
          break;
        }
        case 'panel': {
          const g = this.nextGraphics(graphics++, depth);
          const { x, y, width, height } = op.rect;
          g.fillStyle(op.fill, op.fillAlpha);
          g.fillRoundedRect(x, y, width, height, op.cornerRadius);
          g.lineStyle(2, op.stroke, op.strokeAlpha);
          g.strokeRoundedRect(x, y, width, height, op.cornerRadius);
          break;
        }
        case 'overlay': {
          const g = this.nextGraphics(graphics++, depth);
          g.fillStyle(op.color, op.alpha);
          g.fillRect(0, 0, WINDOW.width, WINDOW.height);
          break;
        }
        case 'text':
          this.nextText(texts[op.style]++, op.style, depth)
            .setText(op.text)
            .setColor(op.color)
            .setOrigin(op.origin.x, op.origin.y)
            .setPosition(op.pos.x, op.pos.y);
          break;
      }
    });
    this.hideFrom(this.graphicsPool, graphics);
    this.hideFrom(this.imagePool, images);
    for (const style of TEXT_STYLE_KEYS) this.hideFrom(this.textPools[style], texts[style]);
  }

  private nextGraphics(slot: number, depth: number) {
    let g = this.graphicsPool[slot];
    if (!g) {
      g = this.add.graphics();
      this.graphicsPool.push(g);
    }
    g.clear();
    return g.setDepth(depth).setVisible(true);
  }

  private nextImage(slot: number, textureKey: string, depth: number) {
    let image = this.imagePool[slot];
    if (!image) {
      image = this.add.image(0, 0, textureKey);
      this.imagePool.push(image);
    } else if (image.texture.key !== textureKey) {
      image.setTexture(textureKey);
    }
    return image.setDepth(depth).setVisible(true);
  }

  private nextText(slot: number, style: TextStyle, depth: number) {
    const pool = this.textPools[style];
    let text = pool[slot];
    if (!text) {
      text = this.add.text(0, 0, '', TEXT_STYLES[style]);
      pool.push(text);
    }
    return text.setDepth(depth).setVisible(true);
  }

  private hideFrom(pool: Array<Phaser.GameObjects.Graphics | Phaser.GameObjects.Image | Phaser.GameObjects.Text>, used: number) {
    for (let i = used; i < pool.length; i += 1) pool[i].setVisible(false);
  }
}
