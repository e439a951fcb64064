/**
 * In-memory host session.
 *
 * A small model of a music host (transport, tempo, tracks with mixer state,
 * devices and clip slots) that implements the Session API for the default
 * catalog. Used by `mixcast serve`, the benchmark and the tests. Like a real
 * host it is not re-entrant: it must only be driven from the Serializer.
 *
 * Parameter names and defaults follow the wire protocol: `track_index`,
 * `clip_index` and `device_index` default to 0, out-of-range indexes raise.
 */

import type { CommandParams } from '@/protocol/index.js';

import { assertRange, readBoolean, readInt, readNumber, readString } from './params.js';
import type { SessionApi } from './types.js';

export interface DeviceParameter {
  name: string;
  value: number;
  min: number;
  max: number;
}

export interface Device {
  name: string;
  className: string;
  parameters: DeviceParameter[];
}

export interface Clip {
  name: string;
  length: number;
  launchMode: number;
  isPlaying: boolean;
}

export type TrackKind = 'midi' | 'audio';

export interface Track {
  name: string;
  kind: TrackKind;
  volume: number;
  pan: number;
  mute: boolean;
  solo: boolean;
  arm: boolean;
  sends: number[];
  devices: Device[];
  clipSlots: Array<Clip | null>;
}

export interface SessionState {
  tempo: number;
  signatureNumerator: number;
  signatureDenominator: number;
  isPlaying: boolean;
  isRecording: boolean;
  /** Song position in beats */
  songTime: number;
  masterVolume: number;
  tracks: Track[];
}

export interface MemorySessionOptions {
  /** MIDI tracks present at startup (default 2) */
  tracks?: number;
  /** Clip slots per track (default 8) */
  clipSlots?: number;
  /** Send slots per track (default 2) */
  returnTracks?: number;
  /** Undo steps kept (default 100) */
  historyLimit?: number;
}

type Operation = (params: CommandParams) => unknown;

/**
 * History key for a continuous control: the setter plus the target it moves.
 */
function gesture(name: string, params: CommandParams, ...targets: string[]): string {
  return [name, ...targets.map((key) => String(params[key]))].join(':');
}

/** 0 dB on the host's fader scale. */
const UNITY_VOLUME = 0.85;
const MIN_TEMPO = 20;
const MAX_TEMPO = 999;
const LAUNCH_MODES = 4;

function createInstrument(): Device {
  return {
    name: 'Synth',
    className: 'InstrumentDevice',
    parameters: [
      { name: 'Device On', value: 1, min: 0, max: 1 },
      { name: 'Filter Freq', value: 0.5, min: 0, max: 1 },
      { name: 'Resonance', value: 0, min: 0, max: 1 },
      { name: 'Attack', value: 0, min: 0, max: 1 },
      { name: 'Release', value: 0.3, min: 0, max: 1 },
    ],
  };
}

export class MemorySession implements SessionApi {
  private state: SessionState;
  private readonly undoStack: SessionState[] = [];
  private readonly redoStack: SessionState[] = [];
  private readonly operations: Map<string, Operation>;
  private readonly clipSlotCount: number;
  private readonly sendCount: number;
  private readonly historyLimit: number;
  /** Gesture of the newest undo entry, while later moves of it fold into that entry */
  private openGesture: string | null = null;

  constructor(options: MemorySessionOptions = {}) {
    this.clipSlotCount = options.clipSlots ?? 8;
    this.sendCount = options.returnTracks ?? 2;
    this.historyLimit = options.historyLimit ?? 100;

    const trackCount = options.tracks ?? 2;
    this.state = {
      tempo: 120,
      signatureNumerator: 4,
      signatureDenominator: 4,
      isPlaying: false,
      isRecording: false,
      songTime: 0,
      masterVolume: UNITY_VOLUME,
      tracks: Array.from({ length: trackCount }, (_, i) => this.createTrack('midi', i + 1)),
    };

    // Continuous controls: repeated moves of one target share an undo entry
    const adjust = (name: string, targets: string[], mutate: Operation): [string, Operation] => [
      name,
      (p) => this.edit(() => mutate(p), gesture(name, p, ...targets)),
    ];

    this.operations = new Map<string, Operation>([
      ['get_info', () => this.getInfo()],
      ['get_track_info', (p) => this.getTrackInfo(p)],
      ['get_all_tracks', () => this.state.tracks.map((track, index) => this.summarize(track, index))],
      ['get_device_parameters', (p) => this.getDeviceParameters(p)],
      ['get_playhead_position', () => this.getPlayheadPosition()],
      ['create_midi_track', (p) => this.edit(() => this.insertTrack('midi', p))],
      ['create_audio_track', (p) => this.edit(() => this.insertTrack('audio', p))],
      ['delete_track', (p) => this.edit(() => this.deleteTrack(p))],
      ['set_track_name', (p) => this.edit(() => this.setTrackName(p))],
      ['create_clip', (p) => this.edit(() => this.createClip(p))],
      ['delete_clip', (p) => this.edit(() => this.deleteClip(p))],
      ['set_tempo', (p) => this.edit(() => this.setTempo(p))],
      ['start_playback', () => this.setPlaying(true)],
      ['stop_playback', () => this.setPlaying(false)],
      ['start_recording', () => this.setRecording(true)],
      ['stop_recording', () => this.setRecording(false)],
      ['undo', () => this.undo()],
      ['redo', () => this.redo()],
      adjust('set_device_parameter', ['track_index', 'device_index', 'parameter_index'], (p) =>
        this.setDeviceParameter(p)
      ),
      adjust('set_track_volume', ['track_index'], (p) => this.setTrackVolume(p)),
      adjust('set_track_pan', ['track_index'], (p) => this.setTrackPan(p)),
      adjust('set_track_mute', ['track_index'], (p) => this.setTrackFlag(p, 'mute')),
      adjust('set_track_solo', ['track_index'], (p) => this.setTrackFlag(p, 'solo')),
      adjust('set_track_arm', ['track_index'], (p) => this.setTrackFlag(p, 'arm')),
      adjust('set_send_amount', ['track_index', 'send_index'], (p) => this.setSendAmount(p)),
      adjust('set_master_volume', [], (p) => this.setMasterVolume(p)),
      adjust('set_clip_launch_mode', ['track_index', 'clip_index'], (p) => this.setClipLaunchMode(p)),
      ['fire_clip', (p) => this.fireClip(p)],
      ['stop_clip', (p) => this.stopClip(p)],
    ]);
  }

  invoke(name: string, params: CommandParams): unknown {
    const operation = this.operations.get(name);
    if (!operation) {
      throw new Error(`Unsupported command: ${name}`);
    }
    return operation(params);
  }

  /**
   * Deep copy of the current state, for inspection.
   */
  snapshot(): SessionState {
    return structuredClone(this.state);
  }

  supports(name: string): boolean {
    return this.operations.has(name);
  }

  // ==========================================================================
  // History
  // ==========================================================================

  /**
   * Run a mutation and record the prior state for undo. Failed mutations leave
   * no history entry.
   *
   * Repeated moves of one control (same `key`, nothing else in between)
   * share a single entry, so one undo returns to where the control started.
   */
  private edit<T>(mutate: () => T, key?: string): T {
    if (key !== undefined && key === this.openGesture && this.undoStack.length > 0) {
      return mutate();
    }

    const before = structuredClone(this.state);
    const result = mutate();
    this.undoStack.push(before);
    if (this.undoStack.length > this.historyLimit) {
      this.undoStack.shift();
    }
    this.redoStack.length = 0;
    this.openGesture = key ?? null;
    return result;
  }

  private undo(): { undone: boolean } {
    this.openGesture = null;
    const previous = this.undoStack.pop();
    if (!previous) {
      return { undone: false };
    }
    this.redoStack.push(this.state);
    this.state = previous;
    return { undone: true };
  }

  private redo(): { redone: boolean } {
    this.openGesture = null;
    const next = this.redoStack.pop();
    if (!next) {
      return { redone: false };
    }
    this.undoStack.push(this.state);
    this.state = next;
    return { redone: true };
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  private createTrack(kind: TrackKind, number: number): Track {
    return {
      name: `${number}-${kind === 'midi' ? 'MIDI' : 'Audio'}`,
      kind,
      volume: UNITY_VOLUME,
      pan: 0,
      mute: false,
      solo: false,
      arm: false,
      sends: Array.from({ length: this.sendCount }, () => 0),
      devices: kind === 'midi' ? [createInstrument()] : [],
      clipSlots: Array.from({ length: this.clipSlotCount }, () => null),
    };
  }

  private track(params: CommandParams): { track: Track; index: number } {
    const index = readInt(params, 'track_index', 0);
    const track = this.state.tracks[index];
    if (!track) {
      throw new RangeError('Track index out of range');
    }
    return { track, index };
  }

  private slotIndex(track: Track, params: CommandParams): number {
    const index = readInt(params, 'clip_index', 0);
    if (index < 0 || index >= track.clipSlots.length) {
      throw new RangeError('Clip index out of range');
    }
    return index;
  }

  private clip(params: CommandParams): Clip {
    const { track } = this.track(params);
    const clip = track.clipSlots[this.slotIndex(track, params)];
    if (!clip) {
      throw new Error('No clip in slot');
    }
    return clip;
  }

  private device(params: CommandParams): Device {
    const { track } = this.track(params);
    const device = track.devices[readInt(params, 'device_index', 0)];
    if (!device) {
      throw new RangeError('Device index out of range');
    }
    return device;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  private getInfo(): Record<string, unknown> {
    const { state } = this;
    return {
      tempo: state.tempo,
      signature_numerator: state.signatureNumerator,
      signature_denominator: state.signatureDenominator,
      is_playing: state.isPlaying,
      is_recording: state.isRecording,
      track_count: state.tracks.length,
      master_track: { name: 'Master', volume: state.masterVolume },
    };
  }

  private summarize(track: Track, index: number): Record<string, unknown> {
    return {
      index,
      name: track.name,
      is_midi_track: track.kind === 'midi',
      is_audio_track: track.kind === 'audio',
      mute: track.mute,
      solo: track.solo,
      arm: track.arm,
      volume: track.volume,
      panning: track.pan,
      device_count: track.devices.length,
      clip_count: track.clipSlots.filter((slot) => slot !== null).length,
    };
  }

  private getTrackInfo(params: CommandParams): Record<string, unknown> {
    const { track, index } = this.track(params);
    return {
      ...this.summarize(track, index),
      sends: [...track.sends],
      clip_slots: track.clipSlots.map((clip, slotIndex) => ({
        index: slotIndex,
        has_clip: clip !== null,
        clip: clip && {
          name: clip.name,
          length: clip.length,
          launch_mode: clip.launchMode,
          is_playing: clip.isPlaying,
        },
      })),
      devices: track.devices.map((device, deviceIndex) => ({
        index: deviceIndex,
        name: device.name,
        class_name: device.className,
      })),
    };
  }

  private getDeviceParameters(params: CommandParams): Record<string, unknown> {
    const device = this.device(params);
    return {
      device_name: device.name,
      parameters: device.parameters.map((parameter, index) => ({ index, ...parameter })),
    };
  }

  private getPlayheadPosition(): Record<string, unknown> {
    const { songTime, signatureNumerator, isPlaying } = this.state;
    const bar = Math.floor(songTime / signatureNumerator) + 1;
    return {
      song_time: songTime,
      bar,
      beat: songTime - (bar - 1) * signatureNumerator,
      is_playing: isPlaying,
    };
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  private insertTrack(kind: TrackKind, params: CommandParams): { index: number; name: string } {
    const { tracks } = this.state;
    const requested = readInt(params, 'index', -1);
    if (requested < -1 || requested > tracks.length) {
      throw new RangeError('Track index out of range');
    }
    const index = requested === -1 ? tracks.length : requested;
    const track = this.createTrack(kind, tracks.length + 1);
    tracks.splice(index, 0, track);
    return { index, name: track.name };
  }

  private deleteTrack(params: CommandParams): { deleted_index: number; track_count: number } {
    const { index } = this.track(params);
    this.state.tracks.splice(index, 1);
    return { deleted_index: index, track_count: this.state.tracks.length };
  }

  private setTrackName(params: CommandParams): { name: string } {
    const { track } = this.track(params);
    track.name = readString(params, 'name', '');
    return { name: track.name };
  }

  private createClip(params: CommandParams): { name: string; length: number } {
    const { track } = this.track(params);
    const slot = this.slotIndex(track, params);
    const length = readNumber(params, 'length', 4.0);
    if (length <= 0) {
      throw new RangeError('Clip length must be positive');
    }
    if (track.clipSlots[slot]) {
      throw new Error('Clip slot already has a clip');
    }
    const clip: Clip = { name: `Clip ${slot + 1}`, length, launchMode: 0, isPlaying: false };
    track.clipSlots[slot] = clip;
    return { name: clip.name, length: clip.length };
  }

  private deleteClip(params: CommandParams): { deleted: boolean } {
    const { track } = this.track(params);
    const slot = this.slotIndex(track, params);
    if (!track.clipSlots[slot]) {
      throw new Error('No clip in slot');
    }
    track.clipSlots[slot] = null;
    return { deleted: true };
  }

  private setTempo(params: CommandParams): { tempo: number } {
    const tempo = readNumber(params, 'tempo', 120);
    assertRange('Tempo', tempo, MIN_TEMPO, MAX_TEMPO);
    this.state.tempo = tempo;
    return { tempo };
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private setPlaying(playing: boolean): { is_playing: boolean } {
    this.state.isPlaying = playing;
    if (!playing) {
      for (const track of this.state.tracks) {
        for (const clip of track.clipSlots) {
          if (clip) {
            clip.isPlaying = false;
          }
        }
      }
    }
    return { is_playing: playing };
  }

  private setRecording(recording: boolean): { is_recording: boolean; is_playing: boolean } {
    this.state.isRecording = recording;
    if (recording) {
      this.state.isPlaying = true;
    }
    return { is_recording: recording, is_playing: this.state.isPlaying };
  }

  // ==========================================================================
  // Real-time control
  // ==========================================================================

  private setDeviceParameter(params: CommandParams): { name: string; value: number } {
    const device = this.device(params);
    const parameter = device.parameters[readInt(params, 'parameter_index', 0)];
    if (!parameter) {
      throw new RangeError('Parameter index out of range');
    }
    const value = readNumber(params, 'value', 0);
    assertRange(parameter.name, value, parameter.min, parameter.max);
    parameter.value = value;
    return { name: parameter.name, value };
  }

  private setTrackVolume(params: CommandParams): { volume: number } {
    const { track } = this.track(params);
    const volume = readNumber(params, 'volume', 0.75);
    assertRange('Volume', volume, 0, 1);
    track.volume = volume;
    return { volume };
  }

  private setTrackPan(params: CommandParams): { pan: number } {
    const { track } = this.track(params);
    const pan = readNumber(params, 'pan', 0);
    assertRange('Pan', pan, -1, 1);
    track.pan = pan;
    return { pan };
  }

  private setTrackFlag(params: CommandParams, flag: 'mute' | 'solo' | 'arm'): Record<string, boolean> {
    const { track } = this.track(params);
    const value = readBoolean(params, flag, false);
    track[flag] = value;
    return { [flag]: value };
  }

  private setSendAmount(params: CommandParams): { send_index: number; value: number } {
    const { track } = this.track(params);
    const sendIndex = readInt(params, 'send_index', 0);
    if (sendIndex < 0 || sendIndex >= track.sends.length) {
      throw new RangeError('Send index out of range');
    }
    const value = readNumber(params, 'value', 0);
    assertRange('Send amount', value, 0, 1);
    track.sends[sendIndex] = value;
    return { send_index: sendIndex, value };
  }

  private setMasterVolume(params: CommandParams): { volume: number } {
    const volume = readNumber(params, 'volume', 0.75);
    assertRange('Volume', volume, 0, 1);
    this.state.masterVolume = volume;
    return { volume };
  }

  private setClipLaunchMode(params: CommandParams): { launch_mode: number } {
    const clip = this.clip(params);
    const mode = readInt(params, 'launch_mode', 0);
    assertRange('Launch mode', mode, 0, LAUNCH_MODES - 1);
    clip.launchMode = mode;
    return { launch_mode: mode };
  }

  private fireClip(params: CommandParams): { fired: boolean } {
    const { track } = this.track(params);
    const target = this.clip(params);
    for (const clip of track.clipSlots) {
      if (clip) {
        clip.isPlaying = clip === target;
      }
    }
    this.state.isPlaying = true;
    return { fired: true };
  }

  private stopClip(params: CommandParams): { stopped: boolean } {
    const { track } = this.track(params);
    const clip = track.clipSlots[this.slotIndex(track, params)];
    if (clip) {
      clip.isPlaying = false;
    }
    return { stopped: true };
  }
}
