/**
 * Boundary to the sound mixer. The SoundManager only talks to the mixer through
 * this interface; HowlerMixer is the runtime implementation.
 */
export interface IMixer<TBuffer> {
    /** Create the fixed-size channel pool */
    open(channelCount: number): void;
    /** Stop everything and release the channel pool */
    close(): void;
    readonly channelCount: number;

    /** Decode a sound file. Throws MixerError('decode') for missing or unsupported data. */
    decode(path: string): TBuffer;
    unload(buffer: TBuffer): void;
    /** Baseline volume of a decoded sound */
    setSoundVolume(buffer: TBuffer, volume: number): void;

    /** Start a sound on a channel, replacing whatever the channel was playing */
    play(channel: number, buffer: TBuffer, volume: number, pan: number): void;
    stop(channel: number): void;
    /** True while the channel plays or holds a paused sound */
    isBusy(channel: number): boolean;
    pause(channel: number): void;
    resume(channel: number): void;
    setVolume(channel: number, volume: number): void;

    stopAll(): void;
    pauseAll(): void;
    resumeAll(): void;
}

export type MixerErrorKind = 'decode' | 'playback';

export class MixerError extends Error {
    public readonly kind: MixerErrorKind;

    constructor(kind: MixerErrorKind, msg: string) {
        super(msg);
        this.name = 'MixerError';
        this.kind = kind;

        Object.seal(this);
    }
}
