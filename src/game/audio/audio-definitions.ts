export enum SoundCategory {
    UI = 'ui',
    Piece = 'piece',
    Game = 'game',
    Other = 'other'
}

/** Per-asset playback configuration */
export interface SoundConfig {
    category: SoundCategory;
    /** Base volume, 0..1 */
    volume: number;
    /** Maximum number of instances of this sound playing at once */
    maxInstances: number;
    /** Minimum time between two play starts of this sound, in seconds */
    minDelay: number;
    /** File relative to the sfx directory; defaults to the name→path convention */
    file?: string;
}

export interface SoundInfo extends SoundConfig {
    playCount: number;
    isLoaded: true;
}

/** Bookkeeping for one in-flight playback */
export interface PlaybackInstance {
    soundName: string;
    /** Clock time of the play start, in ms */
    startTime: number;
    channelId: number;
    /** Volume multiplier passed to play(), kept so volume changes can rescale the channel */
    requestVolume: number;
}

export enum LoadFailure {
    NotFound = 'NotFound',
    DecodeError = 'DecodeError'
}

export enum PlayFailure {
    NotLoaded = 'NotLoaded',
    RateLimited = 'RateLimited',
    ConcurrencyLimited = 'ConcurrencyLimited',
    NoChannelAvailable = 'NoChannelAvailable'
}

export type LoadResult =
    | { ok: true }
    | { ok: false; reason: LoadFailure };

export type PlayResult =
    | { ok: true; channelId: number }
    | { ok: false; reason: PlayFailure };

export interface PlayOptions {
    /** Stereo balance, -1 (left) .. 1 (right). Default: 0. */
    pan?: number;
}

export interface VolumeState {
    master: number;
    sfx: number;
}

export function clampUnit(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.max(0, Math.min(1, value));
}
