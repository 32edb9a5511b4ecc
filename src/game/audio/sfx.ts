import { createLogger } from '../log';
import type { SoundCue } from './router';

const log = createLogger('sfx');

/** Synthesized cues; nothing to download, so a missing sound file can never break a session. */
export class SfxEngine {
  private ctx: AudioContext | null = null;
  private unlocked = false;
  private masterGain: GainNode | null = null;
  private sfxBus: GainNode | null = null;
  private enabled = true;

  private ensureContext() {
    if (!this.ctx) {
      const Ctx = window.AudioContext || (window as typeof window & { webkitAudioContext?: typeof AudioContext }).webkitAudioContext;
      if (!Ctx) return null;
      try {
        this.ctx = new Ctx();
      } catch (err) {
        log.warn('audio context unavailable', err);
        return null;
      }
      this.setupBuses(this.ctx);
    }
    return this.ctx;
  }

  unlock = async () => {
    const ctx = this.ensureContext();
    if (!ctx) return;
    if (ctx.state === 'suspended') {
      try {
        await ctx.resume();
      } catch (err) {
        log.warn('audio resume rejected', err);
      }
    }
    this.unlocked = ctx.state === 'running';
  };

  setEnabled(enabled: boolean) {
    this.enabled = enabled;
    const ctx = this.ensureContext();
    if (ctx && this.masterGain) {
      this.masterGain.gain.setTargetAtTime(enabled ? 0.85 : 0.0001, ctx.currentTime, 0.03);
    }
  }

  play(cue: SoundCue) {
    if (!this.enabled || !this.unlocked) return;
    switch (cue) {
      case 'hit':
        this.splat();
        this.chirp(620, 0.05, 0.02, 'triangle');
        break;
      case 'click':
        this.chirp(880, 0.035, 0.015, 'square');
        break;
      case 'game-over':
        this.fall(280, 90, 0.45);
        break;
    }
  }

  private chirp(freq: number, duration: number, gainPeak: number, type: OscillatorType) {
    const ctx = this.ensureContext();
    if (!ctx) return;
    const now = ctx.currentTime;
    const osc = ctx.createOscillator();
    const gain = ctx.createGain();
    osc.type = type;
    osc.frequency.setValueAtTime(freq, now);
    gain.gain.setValueAtTime(0.0001, now);
    gain.gain.exponentialRampToValueAtTime(gainPeak, now + 0.01);
    gain.gain.exponentialRampToValueAtTime(0.0001, now + duration);
    osc.connect(gain).connect(this.sfxBus ?? ctx.destination);
    osc.start(now);
    osc.stop(now + duration + 0.02);
  }

  private fall(from: number, to: number, duration: number) {
    const ctx = this.ensureContext();
    if (!ctx) return;
    const now = ctx.currentTime;
    const osc = ctx.createOscillator();
    const gain = ctx.createGain();
    osc.type = 'sawtooth';
    osc.frequency.setValueAtTime(from, now);
    osc.frequency.exponentialRampToValueAtTime(to, now + duration);
    gain.gain.setValueAtTime(0.0001, now);
    gain.gain.exponentialRampToValueAtTime(0.035, now + 0.02);
    gain.gain.exponentialRampToValueAtTime(0.0001, now + duration);
    osc.connect(gain).connect(this.sfxBus ?? ctx.destination);
    osc.start(now);
    osc.stop(now + duration + 0.03);
  }

  private splat() {
    const ctx = this.ensureContext();
    if (!ctx) return;
    const length = Math.floor(ctx.sampleRate * 0.09);
    const buffer = ctx.createBuffer(1, length, ctx.sampleRate);
    const data = buffer.getChannelData(0);
    for (let i = 0; i < length; i += 1) {
      data[i] = (Math.random() * 2 - 1) * (1 - i / length) ** 2;
    }
    const src = ctx.createBufferSource();
    src.buffer = buffer;
    const filter = ctx.createBiquadFilter();
    filter.type = 'lowpass';
    filter.frequency.value = 1200;
    const gain = ctx.createGain();
    gain.gain.value = 0.06;
    src.connect(filter).connect(gain).connect(this.sfxBus ?? ctx.destination);
    src.start();
  }

  private setupBuses(ctx: AudioContext) {
    const master = ctx.createGain();
    const sfxBus = ctx.createGain();
    const compressor = ctx.createDynamicsCompressor();
    compressor.threshold.value = -20;
    compressor.knee.value = 12;
    compressor.ratio.value = 4;
    compressor.attack.value = 0.01;
    compressor.release.value = 0.14;
    master.gain.value = 0.85;
    sfxBus.gain.value = 1;
    sfxBus.connect(master);
    master.connect(compressor).connect(ctx.destination);
    this.masterGain = master;
    this.sfxBus = sfxBus;
  }
}
