import { useEffect, useRef, useState } from 'react';
import { GameCanvas } from '../components/GameCanvas';
import {
  DEFAULT_PLAYER_NAME,
  defaultSessionConfig,
  difficulties,
  difficultyKeys,
  resolveDifficulty,
  type GameEvent,
  type PhaseOutcome,
  type SessionConfig,
  type SessionSummary,
} from '../game/core';
import { routeAudioEvents, type AudioPort } from '../game/audio/router';
import { MusicTrack } from '../game/audio/music';
import { SfxEngine } from '../game/audio/sfx';
import { KeyboardInput } from '../game/input/keyboard';
import { InputQueue } from '../game/input/queue';
import { createLogger } from '../game/log';
import { defaultTheme, resolveTheme, themeKeys, themes, type ThemeSkin } from '../game/theme';

const log = createLogger('app');

const MUSIC_VOLUME = 0.5;

type View = 'menu' | 'playing' | 'closed';

export function App() {
  const [view, setView] = useState<View>('menu');
  const [config, setConfig] = useState<SessionConfig>(defaultSessionConfig);
  const [soundEnabled, setSoundEnabled] = useState(true);
  const [lastRun, setLastRun] = useState<SessionSummary | null>(null);

  const inputsRef = useRef<InputQueue | null>(null);
  const sfxRef = useRef<SfxEngine | null>(null);
  const musicRef = useRef<MusicTrack | null>(null);
  const menuMusicStartedRef = useRef(false);

  if (!inputsRef.current) inputsRef.current = new InputQueue();
  if (!sfxRef.current) sfxRef.current = new SfxEngine();
  if (!musicRef.current) musicRef.current = new MusicTrack();

  useEffect(() => {
    if (!inputsRef.current) return;
    const keyboard = new KeyboardInput(inputsRef.current, window);
    return () => keyboard.destroy();
  }, []);

  useEffect(() => {
    sfxRef.current?.setEnabled(soundEnabled);
    musicRef.current?.setVolume(soundEnabled ? MUSIC_VOLUME : 0);
  }, [soundEnabled]);

  const audio: AudioPort = {
    playCue: (cue) => sfxRef.current?.play(cue),
    stopMusic: () => musicRef.current?.stop(),
  };

  const playTrack = (path: string | undefined) => {
    const music = musicRef.current;
    if (!music) return;
    if (!path) {
      music.stop();
      return;
    }
    music.load(path);
    music.setVolume(soundEnabled ? MUSIC_VOLUME : 0);
    music.play(true);
  };

  const playMenuMusic = () => playTrack(defaultTheme.music);

  // Browsers only allow sound after a gesture, so the menu track starts on the first one.
  const onAnyGesture = () => {
    void sfxRef.current?.unlock();
    if (view === 'menu' && !menuMusicStartedRef.current) {
      menuMusicStartedRef.current = true;
      playMenuMusic();
    }
  };

  const startGame = () => {
    void sfxRef.current?.unlock();
    audio.playCue('click');
    const name = config.playerName.trim() || DEFAULT_PLAYER_NAME;
    setConfig((prev) => ({ ...prev, playerName: name }));
    log.debug('starting', { ...config, playerName: name });
    setView('playing');
  };

  const quitGame = () => {
    audio.playCue('click');
    musicRef.current?.stop();
    setView('closed');
  };

  const handleEvents = (events: readonly GameEvent[]) => {
    routeAudioEvents(events, audio);
  };

  const handleSessionStarted = (skin: ThemeSkin) => {
    playTrack(skin.music);
  };

  const handlePhaseEnded = (outcome: PhaseOutcome, summary: SessionSummary | null) => {
    if (summary) setLastRun(summary);
    if (outcome === 'quit') {
      musicRef.current?.stop();
      setView('closed');
      return;
    }
    setView('menu');
    playMenuMusic();
  };

  if (view === 'closed') {
    return (
      <div className="app-shell">
        <div className="center-card compact">
          <h2>Thanks for playing</h2>
          <p>Mole Attack has closed. Reload the page to play again.</p>
        </div>
      </div>
    );
  }

  return (
    <div className="app-shell" onPointerDown={onAnyGesture}>
      {view === 'playing' && inputsRef.current && (
        <section className="game-panel">
          <GameCanvas
            config={config}
            inputs={inputsRef.current}
            onEvents={handleEvents}
            onSessionStarted={handleSessionStarted}
            onPhaseEnded={handlePhaseEnded}
          />
        </section>
      )}

      {view === 'menu' && (
        <div className="menu-panel">
          <h1>Mole Attack</h1>
          <p className="welcome">Welcome!!!</p>

          <div className="menu-section">
            <label>
              Name
              <input
                type="text"
                value={config.playerName}
                maxLength={24}
                onChange={(e) => setConfig((prev) => ({ ...prev, playerName: e.target.value }))}
              />
            </label>
            <label>
              Difficulty
              <select
                value={config.difficulty}
                onChange={(e) => setConfig((prev) => ({ ...prev, difficulty: resolveDifficulty(e.target.value).key }))}
              >
                {difficultyKeys.map((key) => (
                  <option key={key} value={key}>{difficulties[key].label}</option>
                ))}
              </select>
            </label>
            <label>
              Theme
              <select
                value={config.theme}
                onChange={(e) => setConfig((prev) => ({ ...prev, theme: resolveTheme(e.target.value).key }))}
              >
                {themeKeys.map((key) => (
                  <option key={key} value={key}>{themes[key].name}</option>
                ))}
              </select>
            </label>
            <label className="toggle-row">
              <span>Sound</span>
              <input type="checkbox" checked={soundEnabled} onChange={(e) => setSoundEnabled(e.target.checked)} />
            </label>
          </div>

          <div className="menu-actions">
            <button type="button" onClick={startGame}>Play</button>
            <button type="button" className="secondary" onClick={quitGame}>Quit</button>
          </div>

          {lastRun && (
            <div className="menu-section">
              <h3>Last run</h3>
              <div className="stats-grid">
                <span>Player</span><strong>{lastRun.playerName}</strong>
                <span>Difficulty</span><strong>{difficulties[lastRun.difficulty].label}</strong>
                <span>Score</span><strong>{lastRun.score}</strong>
                <span>Misses</span><strong>{lastRun.misses}</strong>
                <span>Accuracy</span><strong>{Math.round(lastRun.accuracy * 100)}%</strong>
              </div>
            </div>
          )}
        </div>
      )}
    </div>
  );
}
