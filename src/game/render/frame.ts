import { EXIT_CONTROL, WINDOW } from '../core/config';
import { displaySeconds } from '../core/engine';
import type { Rect, SessionState, Vec2 } from '../core/types';
import type { BackgroundVisual, EntityVisual, ThemeSkin } from '../theme/types';

export const TEXT_COLOR = '#f5f5eb';
export const GAME_OVER_COLOR = '#ff645a';

export type TextStyle = 'hud' | 'label' | 'title' | 'countdown';

export type DrawOp =
  | { kind: 'background'; visual: BackgroundVisual }
  | { kind: 'hideout'; pos: Vec2; radius: number; visual: EntityVisual }
  | { kind: 'target'; pos: Vec2; radius: number; visual: EntityVisual }
  | {
    kind: 'panel';
    rect: Rect;
    fill: number;
    fillAlpha: number;
    stroke: number;
    strokeAlpha: number;
    cornerRadius: number;
  }
  | { kind: 'text'; text: string; pos: Vec2; origin: Vec2; style: TextStyle; color: string }
  | { kind: 'overlay'; color: number; alpha: number };

export type SessionView = Readonly<Pick<
  SessionState,
  'mode' | 'layout' | 'targets' | 'score' | 'lives' | 'remainingMs' | 'exitRect' | 'config' | 'difficulty'
>>;

export type CountdownView = {
  numeral: number;
  skin: ThemeSkin;
};

const HUD_CARD: Rect = { x: 10, y: 10, width: 230, height: 110 };
const HUD_PADDING = { x: 14, y: 10 };
const HUD_LINE_SPACING = 30;

const TOP_LEFT: Vec2 = { x: 0, y: 0 };
const TOP_RIGHT: Vec2 = { x: 1, y: 0 };
const CENTER: Vec2 = { x: 0.5, y: 0.5 };

const hudOps = (view: SessionView): DrawOp[] => {
  const x = HUD_CARD.x + HUD_PADDING.x;
  const y = HUD_CARD.y + HUD_PADDING.y;
  const lines = [
    `Score: ${view.score}`,
    `Lives: ${view.lives}`,
    `Time: ${String(displaySeconds(view)).padStart(2, '0')}`,
  ];
  return [
    {
      kind: 'panel',
      rect: HUD_CARD,
      fill: 0x145028,
      fillAlpha: 170 / 255,
      stroke: 0xffe68c,
      strokeAlpha: 220 / 255,
      cornerRadius: 16,
    },
    ...lines.map((text, i): DrawOp => ({
      kind: 'text',
      text,
      pos: { x, y: y + HUD_LINE_SPACING * i },
      origin: TOP_LEFT,
      style: 'hud',
      color: TEXT_COLOR,
    })),
  ];
};

const labelOps = (view: SessionView): DrawOp[] => [
  {
    kind: 'text',
    text: `Player: ${view.config.playerName}`,
    pos: { x: WINDOW.width - 15, y: 12 },
    origin: TOP_RIGHT,
    style: 'label',
    color: TEXT_COLOR,
  },
  {
    kind: 'text',
    text: `Difficulty: ${view.difficulty.label}`,
    pos: { x: WINDOW.width - 15, y: 36 },
    origin: TOP_RIGHT,
    style: 'label',
    color: TEXT_COLOR,
  },
];

const exitOps = (rect: Rect): DrawOp[] => [
  {
    kind: 'panel',
    rect,
    fill: 0x0a3c28,
    fillAlpha: 210 / 255,
    stroke: 0xffdc82,
    strokeAlpha: 1,
    cornerRadius: 10,
  },
  {
    kind: 'text',
    text: EXIT_CONTROL.label,
    pos: { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 },
    origin: CENTER,
    style: 'hud',
    color: TEXT_COLOR,
  },
];

const gameOverOps = (score: number): DrawOp[] => {
  const cx = WINDOW.width / 2;
  const cy = WINDOW.height / 2;
  return [
    { kind: 'overlay', color: 0x000000, alpha: 180 / 255 },
    { kind: 'text', text: 'GAME OVER', pos: { x: cx, y: cy - 40 }, origin: CENTER, style: 'title', color: GAME_OVER_COLOR },
    { kind: 'text', text: `Final Score: ${score}`, pos: { x: cx, y: cy + 10 }, origin: CENTER, style: 'hud', color: TEXT_COLOR },
    { kind: 'text', text: 'Press ESC to return to menu', pos: { x: cx, y: cy + 50 }, origin: CENTER, style: 'hud', color: TEXT_COLOR },
  ];
};

/** Everything one session frame shows, back to front. Reads the state, never writes it. */
export const buildSessionFrame = (view: SessionView, skin: ThemeSkin): DrawOp[] => {
  const { layout } = view;
  const ops: DrawOp[] = [{ kind: 'background', visual: skin.background }];
  for (const pos of layout.positions) {
    ops.push({ kind: 'hideout', pos, radius: layout.radius, visual: skin.hideout });
  }
  for (const target of view.targets) {
    if (target.active) ops.push({ kind: 'target', pos: target.pos, radius: target.radius, visual: skin.target });
  }
  ops.push(...hudOps(view), ...labelOps(view), ...exitOps(view.exitRect));
  if (view.mode === 'gameOver') ops.push(...gameOverOps(view.score));
  return ops;
};

export const buildCountdownFrame = (view: CountdownView): DrawOp[] => [
  { kind: 'background', visual: view.skin.background },
  { kind: 'overlay', color: 0x000000, alpha: 150 / 255 },
  {
    kind: 'text',
    text: String(view.numeral),
    pos: { x: WINDOW.width / 2, y: WINDOW.height / 2 },
    origin: CENTER,
    style: 'countdown',
    color: '#ffffff',
  },
];
