/**
 * Public API of the audio module.
 *
 * All external code should import from this barrel file.
 */

// Core types
export { SoundCategory, LoadFailure, PlayFailure, clampUnit } from './audio-definitions';
export type {
    SoundConfig,
    SoundInfo,
    PlaybackInstance,
    LoadResult,
    PlayResult,
    PlayOptions,
    VolumeState,
} from './audio-definitions';

// Configuration
export { DEFAULT_AUDIO_SETTINGS, resolveAudioSettings } from './audio-settings';
export type { AudioSettings } from './audio-settings';
export { parseSoundTable, loadSoundTable, emptySoundTable } from './sound-table';
export type { SoundTable } from './sound-table';
export { SoundFileResolver, nodeFileProbe } from './sound-files';
export type { FileProbe } from './sound-files';

// Mixer boundary
export { MixerError } from './mixer';
export type { IMixer, MixerErrorKind } from './mixer';
export { HowlerMixer } from './howler-mixer';

// Channel bookkeeping
export { ChannelPool } from './channel-pool';
export type { ChannelAcquisition } from './channel-pool';

// Main sound manager
export { SoundManager } from './sound-manager';
export type { SoundManagerOptions } from './sound-manager';

// Convenience façade
export { SoundEffect } from './sound-effect';
export type { Point, SoundEffectOptions, SoundEffectStatus } from './sound-effect';

// Howler-backed setup for the game
export { createGameAudio } from './game-audio';
export type { GameAudio, GameAudioOptions } from './game-audio';
