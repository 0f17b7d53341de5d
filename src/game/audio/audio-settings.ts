import { clampUnit } from './audio-definitions';

/**
 * Process-wide audio defaults. Add new settings here and give them a default
 * in DEFAULT_AUDIO_SETTINGS.
 */
export interface AudioSettings {
    // Mixer
    channelCount: number;

    // Per-sound defaults
    maxSoundInstances: number;
    minPlayDelay: number;

    // Volume
    masterVolume: number;
    sfxVolume: number;

    // Bookkeeping
    staleInstanceAge: number;

    // Files
    sfxPath: string;
    extensions: string[];
}

export const DEFAULT_AUDIO_SETTINGS: Readonly<AudioSettings> = {
    channelCount: 8,

    maxSoundInstances: 3,
    minPlayDelay: 0.05,

    masterVolume: 1.0,
    sfxVolume: 0.7,

    staleInstanceAge: 10,

    sfxPath: 'assets/sfx',
    extensions: ['.wav', '.ogg', '.mp3'],
};

function requireInteger(name: string, value: number, min: number): void {
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`Invalid audio setting ${name}: ${value} (expected an integer >= ${min})`);
    }
}

function requireNonNegative(name: string, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`Invalid audio setting ${name}: ${value} (expected a number >= 0)`);
    }
}

/** Merge overrides with the defaults and validate the result */
export function resolveAudioSettings(overrides: Partial<AudioSettings> = {}): AudioSettings {
    const settings: AudioSettings = {
        ...DEFAULT_AUDIO_SETTINGS,
        ...overrides,
        extensions: [...(overrides.extensions ?? DEFAULT_AUDIO_SETTINGS.extensions)],
    };

    requireInteger('channelCount', settings.channelCount, 0);
    requireInteger('maxSoundInstances', settings.maxSoundInstances, 1);
    requireNonNegative('minPlayDelay', settings.minPlayDelay);
    requireNonNegative('staleInstanceAge', settings.staleInstanceAge);

    if (settings.extensions.length === 0) {
        throw new Error('Invalid audio setting extensions: at least one file extension is required');
    }

    settings.masterVolume = clampUnit(settings.masterVolume);
    settings.sfxVolume = clampUnit(settings.sfxVolume);

    return settings;
}
