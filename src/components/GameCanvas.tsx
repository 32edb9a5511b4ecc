import { useEffect, useRef } from 'react';
import Phaser from 'phaser';
import { GameScene, type SceneBridge } from '../game/phaser/GameScene';
import { FPS, WINDOW, type GameEvent, type PhaseOutcome, type SessionConfig, type SessionSummary } from '../game/core';
import type { InputQueue } from '../game/input/queue';
import type { ThemeSkin } from '../game/theme';

type Props = {
  config: SessionConfig;
  inputs: InputQueue;
  onEvents: (events: readonly GameEvent[]) => void;
  onSessionStarted: (skin: ThemeSkin) => void;
  onPhaseEnded: (outcome: PhaseOutcome, summary: SessionSummary | null) => void;
};

/** Mounted for one countdown + session; unmounting tears the Phaser game down. */
export function GameCanvas(props: Props) {
  const hostRef = useRef<HTMLDivElement | null>(null);
  const gameRef = useRef<Phaser.Game | null>(null);
  const propsRef = useRef(props);
  propsRef.current = props;
  const bridgeRef = useRef<SceneBridge | null>(null);
  if (!bridgeRef.current) {
    bridgeRef.current = {
      getConfig: () => propsRef.current.config,
      inputs: props.inputs,
      onEvents: (events) => propsRef.current.onEvents(events),
      onSessionStarted: (skin) => propsRef.current.onSessionStarted(skin),
      onPhaseEnded: (outcome, summary) => propsRef.current.onPhaseEnded(outcome, summary),
    };
  }

  useEffect(() => {
    if (!hostRef.current || gameRef.current) return;
    const game = new Phaser.Game({
      type: Phaser.AUTO,
      parent: hostRef.current,
      width: WINDOW.width,
      height: WINDOW.height,
      backgroundColor: '#143c28',
      scale: {
        mode: Phaser.Scale.FIT,
        autoCenter: Phaser.Scale.CENTER_BOTH,
      },
      scene: [],
      audio: { noAudio: true },
      fps: { target: FPS, forceSetTimeOut: true },
    });
    gameRef.current = game;
    game.scene.add('GameScene', GameScene, true, { bridge: bridgeRef.current });

    return () => {
      game.destroy(true);
      gameRef.current = null;
    };
  }, []);

  return <div className="game-canvas-host" ref={hostRef} aria-label="Game canvas" />;
}
