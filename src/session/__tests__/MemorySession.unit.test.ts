/**
 * MemorySession Unit Tests
 *
 * The in-memory host backs the CLI server and the end-to-end tests, so its
 * results and failures are the ones callers see on the wire.
 */

import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { DEFAULT_CATALOG } from '@/registry/index.js';
import { MemorySession } from '@/session/index.js';

void describe('MemorySession catalog coverage', () => {
  void it('supports every catalog command', () => {
    const session = new MemorySession();

    for (const entry of DEFAULT_CATALOG) {
      assert.equal(session.supports(entry.name), true, entry.name);
    }
  });

  void it('rejects an unsupported command', () => {
    const session = new MemorySession();

    assert.throws(() => session.invoke('launch_rocket', {}), { message: 'Unsupported command: launch_rocket' });
  });
});

void describe('MemorySession queries', () => {
  void it('reports the session overview', () => {
    const session = new MemorySession({ tracks: 3 });

    assert.deepEqual(session.invoke('get_info', {}), {
      tempo: 120,
      signature_numerator: 4,
      signature_denominator: 4,
      is_playing: false,
      is_recording: false,
      track_count: 3,
      master_track: { name: 'Master', volume: 0.85 },
    });
  });

  void it('reports the playhead at the start of the song', () => {
    const session = new MemorySession();

    assert.deepEqual(session.invoke('get_playhead_position', {}), {
      song_time: 0,
      bar: 1,
      beat: 0,
      is_playing: false,
    });
  });

  void it('lists device parameters with their index', () => {
    const session = new MemorySession();
    const result = session.invoke('get_device_parameters', { track_index: 0, device_index: 0 });

    assert.deepEqual(result, {
      device_name: 'Synth',
      parameters: [
        { index: 0, name: 'Device On', value: 1, min: 0, max: 1 },
        { index: 1, name: 'Filter Freq', value: 0.5, min: 0, max: 1 },
        { index: 2, name: 'Resonance', value: 0, min: 0, max: 1 },
        { index: 3, name: 'Attack', value: 0, min: 0, max: 1 },
        { index: 4, name: 'Release', value: 0.3, min: 0, max: 1 },
      ],
    });
  });

  void it('raises for a track that does not exist', () => {
    const session = new MemorySession();

    assert.throws(() => session.invoke('get_track_info', { track_index: 2 }), {
      name: 'RangeError',
      message: 'Track index out of range',
    });
  });
});

void describe('MemorySession structure', () => {
  void it('appends a track by default and inserts at an index', () => {
    const session = new MemorySession();

    assert.deepEqual(session.invoke('create_midi_track', {}), { index: 2, name: '3-MIDI' });
    assert.deepEqual(session.invoke('create_audio_track', { index: 0 }), { index: 0, name: '4-Audio' });
    assert.deepEqual(
      session.snapshot().tracks.map((track) => track.name),
      ['4-Audio', '1-MIDI', '2-MIDI', '3-MIDI']
    );
  });

  void it('deletes a track', () => {
    const session = new MemorySession();

    assert.deepEqual(session.invoke('delete_track', { track_index: 0 }), {
      deleted_index: 0,
      track_count: 1,
    });
    assert.equal(session.snapshot().tracks[0]?.name, '2-MIDI');
  });

  void it('bounds the tempo', () => {
    const session = new MemorySession();

    assert.deepEqual(session.invoke('set_tempo', { tempo: 128 }), { tempo: 128 });
    assert.throws(() => session.invoke('set_tempo', { tempo: 10 }), {
      message: 'Tempo must be between 20 and 999',
    });
    assert.equal(session.snapshot().tempo, 128);
  });

  void it('creates a clip once per slot', () => {
    const session = new MemorySession();

    assert.deepEqual(session.invoke('create_clip', { track_index: 1, clip_index: 2, length: 8 }), {
      name: 'Clip 3',
      length: 8,
    });
    assert.throws(() => session.invoke('create_clip', { track_index: 1, clip_index: 2 }), {
      message: 'Clip slot already has a clip',
    });
  });

  void it('rejects a parameter of the wrong type', () => {
    const session = new MemorySession();

    assert.throws(() => session.invoke('set_track_volume', { volume: 'loud' }), {
      name: 'TypeError',
      message: "Parameter 'volume' must be a number",
    });
  });
});

void describe('MemorySession history', () => {
  void it('undoes and redoes an edit', () => {
    const session = new MemorySession();
    session.invoke('set_tempo', { tempo: 140 });

    assert.deepEqual(session.invoke('undo', {}), { undone: true });
    assert.equal(session.snapshot().tempo, 120);
    assert.deepEqual(session.invoke('redo', {}), { redone: true });
    assert.equal(session.snapshot().tempo, 140);
  });

  void it('records nothing for a failed edit', () => {
    const session = new MemorySession();

    assert.throws(() => session.invoke('delete_track', { track_index: 5 }));
    assert.deepEqual(session.invoke('undo', {}), { undone: false });
  });

  void it('keeps only the configured number of steps', () => {
    const session = new MemorySession({ historyLimit: 2 });
    session.invoke('set_tempo', { tempo: 100 });
    session.invoke('set_tempo', { tempo: 110 });
    session.invoke('set_tempo', { tempo: 130 });

    assert.deepEqual(session.invoke('undo', {}), { undone: true });
    assert.deepEqual(session.invoke('undo', {}), { undone: true });
    assert.deepEqual(session.invoke('undo', {}), { undone: false });
    assert.equal(session.snapshot().tempo, 100);
  });

  void it('folds repeated moves of one control into a single step', () => {
    const session = new MemorySession();
    session.invoke('set_tempo', { tempo: 100 });
    for (let i = 1; i <= 500; i++) {
      session.invoke('set_track_volume', { track_index: 0, volume: i / 1000 });
    }

    assert.equal(session.snapshot().tracks[0]?.volume, 0.5);
    assert.deepEqual(session.invoke('undo', {}), { undone: true });
    assert.equal(session.snapshot().tracks[0]?.volume, 0.85);
    assert.deepEqual(session.invoke('undo', {}), { undone: true });
    assert.equal(session.snapshot().tempo, 120);
    assert.deepEqual(session.invoke('undo', {}), { undone: false });
  });

  void it('starts a new step when a different control moves', () => {
    const session = new MemorySession();
    session.invoke('set_track_volume', { track_index: 0, volume: 0.2 });
    session.invoke('set_track_volume', { track_index: 1, volume: 0.3 });
    session.invoke('set_track_volume', { track_index: 0, volume: 0.4 });

    session.invoke('undo', {});
    assert.equal(session.snapshot().tracks[0]?.volume, 0.2);
    assert.equal(session.snapshot().tracks[1]?.volume, 0.3);

    session.invoke('undo', {});
    assert.equal(session.snapshot().tracks[1]?.volume, 0.85);
  });

  void it('clears redo after a new edit', () => {
    const session = new MemorySession();
    session.invoke('set_tempo', { tempo: 90 });
    session.invoke('undo', {});
    session.invoke('set_track_name', { track_index: 0, name: 'Drums' });

    assert.deepEqual(session.invoke('redo', {}), { redone: false });
  });
});

void describe('MemorySession real-time control', () => {
  void it('converges when the same setter is applied twice', () => {
    const session = new MemorySession();

    session.invoke('set_track_volume', { track_index: 1, volume: 0.5 });
    const once = session.snapshot();
    session.invoke('set_track_volume', { track_index: 1, volume: 0.5 });

    assert.deepEqual(session.snapshot().tracks, once.tracks);
  });

  void it('sets mixer flags and sends', () => {
    const session = new MemorySession();

    assert.deepEqual(session.invoke('set_track_mute', { track_index: 1, mute: true }), { mute: true });
    assert.deepEqual(session.invoke('set_send_amount', { track_index: 1, send_index: 1, value: 0.3 }), {
      send_index: 1,
      value: 0.3,
    });

    const track = session.snapshot().tracks[1];
    assert.equal(track?.mute, true);
    assert.deepEqual(track?.sends, [0, 0.3]);
  });

  void it('bounds a device parameter by its own range', () => {
    const session = new MemorySession();

    assert.deepEqual(
      session.invoke('set_device_parameter', { track_index: 0, parameter_index: 1, value: 0.7 }),
      { name: 'Filter Freq', value: 0.7 }
    );
    assert.throws(
      () => session.invoke('set_device_parameter', { track_index: 0, parameter_index: 1, value: 2 }),
      { message: 'Filter Freq must be between 0 and 1' }
    );
  });

  void it('fires one clip per track and stops clips with the transport', () => {
    const session = new MemorySession();
    session.invoke('create_clip', { track_index: 0, clip_index: 0 });
    session.invoke('create_clip', { track_index: 0, clip_index: 1 });

    assert.throws(() => session.invoke('fire_clip', { track_index: 0, clip_index: 2 }), {
      message: 'No clip in slot',
    });
    session.invoke('fire_clip', { track_index: 0, clip_index: 0 });
    session.invoke('fire_clip', { track_index: 0, clip_index: 1 });

    let slots = session.snapshot().tracks[0]?.clipSlots ?? [];
    assert.deepEqual(
      slots.slice(0, 2).map((clip) => clip?.isPlaying),
      [false, true]
    );
    assert.equal(session.snapshot().isPlaying, true);

    session.invoke('stop_playback', {});
    slots = session.snapshot().tracks[0]?.clipSlots ?? [];
    assert.equal(slots[1]?.isPlaying, false);
  });
});
