/**
 * Default command catalog.
 *
 * Every entry forwards to the Session API under the same name. The tier column
 * is the reviewable safety decision for each command: only setters whose
 * repeated application converges, reversible toggles and trigger-style fires
 * are LossyEligible.
 */

import { CommandRegistry } from './CommandRegistry.js';
import { SafetyTier } from './types.js';

export interface CatalogEntry {
  name: string;
  tier: SafetyTier;
  description: string;
}

const { NeverLossy, LossyEligible } = SafetyTier;

export const DEFAULT_CATALOG: readonly CatalogEntry[] = [
  // Queries
  { name: 'get_info', tier: NeverLossy, description: 'Session overview: tempo, signature, transport, track count' },
  { name: 'get_track_info', tier: NeverLossy, description: 'Mixer state, clip slots and devices of one track' },
  { name: 'get_all_tracks', tier: NeverLossy, description: 'Summary of every track' },
  { name: 'get_device_parameters', tier: NeverLossy, description: 'Parameters of one device' },
  { name: 'get_playhead_position', tier: NeverLossy, description: 'Current song position' },

  // Structure
  { name: 'create_midi_track', tier: NeverLossy, description: 'Insert a MIDI track' },
  { name: 'create_audio_track', tier: NeverLossy, description: 'Insert an audio track' },
  { name: 'delete_track', tier: NeverLossy, description: 'Remove a track' },
  { name: 'set_track_name', tier: NeverLossy, description: 'Rename a track' },
  { name: 'create_clip', tier: NeverLossy, description: 'Create an empty clip in a slot' },
  { name: 'delete_clip', tier: NeverLossy, description: 'Remove the clip in a slot' },
  { name: 'set_tempo', tier: NeverLossy, description: 'Set song tempo in BPM' },

  // Transport and history
  { name: 'start_playback', tier: NeverLossy, description: 'Start the song transport' },
  { name: 'stop_playback', tier: NeverLossy, description: 'Stop the song transport' },
  { name: 'start_recording', tier: NeverLossy, description: 'Arm global record and start the transport' },
  { name: 'stop_recording', tier: NeverLossy, description: 'Disarm global record' },
  { name: 'undo', tier: NeverLossy, description: 'Undo the last edit' },
  { name: 'redo', tier: NeverLossy, description: 'Redo the last undone edit' },

  // Real-time control
  { name: 'set_device_parameter', tier: LossyEligible, description: 'Set one device parameter value' },
  { name: 'set_track_volume', tier: LossyEligible, description: 'Set track volume (0..1)' },
  { name: 'set_track_pan', tier: LossyEligible, description: 'Set track panning (-1..1)' },
  { name: 'set_track_mute', tier: LossyEligible, description: 'Mute or unmute a track' },
  { name: 'set_track_solo', tier: LossyEligible, description: 'Solo or unsolo a track' },
  { name: 'set_track_arm', tier: LossyEligible, description: 'Arm or disarm a track' },
  { name: 'set_send_amount', tier: LossyEligible, description: 'Set a track send level (0..1)' },
  { name: 'set_master_volume', tier: LossyEligible, description: 'Set master volume (0..1)' },
  { name: 'set_clip_launch_mode', tier: LossyEligible, description: 'Set clip launch mode (0..3)' },
  { name: 'fire_clip', tier: LossyEligible, description: 'Launch the clip in a slot' },
  { name: 'stop_clip', tier: LossyEligible, description: 'Stop the clip in a slot' },
];

/**
 * Build a sealed registry holding the default catalog.
 *
 * @param extend - Registers extra commands before the registry is sealed
 */
export function createDefaultRegistry(extend?: (registry: CommandRegistry) => void): CommandRegistry {
  const registry = new CommandRegistry();

  for (const entry of DEFAULT_CATALOG) {
    registry.register(
      entry.name,
      (session, params) => session.invoke(entry.name, params),
      entry.tier,
      entry.description
    );
  }

  extend?.(registry);
  return registry.seal();
}
