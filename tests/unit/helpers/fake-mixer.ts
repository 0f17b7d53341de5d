import { basename, dirname } from 'path';
import { IMixer, MixerError } from '@/game/audio/mixer';
import { FileProbe } from '@/game/audio/sound-files';

export interface FakeBuffer {
    path: string;
    volume: number;
    unloaded: boolean;
}

export interface FakeChannel {
    buffer: FakeBuffer;
    volume: number;
    pan: number;
    paused: boolean;
}

/**
 * In-process mixer: channels play until finish() is called for them.
 */
export class FakeMixer implements IMixer<FakeBuffer> {
    public channels: (FakeChannel | null)[] = [];
    public decoded: FakeBuffer[] = [];
    public isOpen = false;

    /** Paths whose decode() throws */
    public undecodable = new Set<string>();
    /** Buffers whose play() throws a decode error */
    public corrupt = new Set<FakeBuffer>();
    /** Makes every play() throw a playback error */
    public failPlayback = false;

    public get channelCount(): number {
        return this.channels.length;
    }

    public open(channelCount: number): void {
        this.channels = new Array<FakeChannel | null>(channelCount).fill(null);
        this.isOpen = true;
    }

    public close(): void {
        this.channels = [];
        this.isOpen = false;
    }

    public decode(path: string): FakeBuffer {
        if (this.undecodable.has(path)) {
            throw new MixerError('decode', `cannot decode ${path}`);
        }
        const buffer: FakeBuffer = { path, volume: 1, unloaded: false };
        this.decoded.push(buffer);
        return buffer;
    }

    public unload(buffer: FakeBuffer): void {
        buffer.unloaded = true;
    }

    public setSoundVolume(buffer: FakeBuffer, volume: number): void {
        buffer.volume = volume;
    }

    public play(channel: number, buffer: FakeBuffer, volume: number, pan: number): void {
        if (this.corrupt.has(buffer)) {
            throw new MixerError('decode', `corrupt data in ${buffer.path}`);
        }
        if (this.failPlayback) {
            throw new MixerError('playback', 'device lost');
        }
        this.channels[channel] = { buffer, volume, pan, paused: false };
    }

    public stop(channel: number): void {
        this.channels[channel] = null;
    }

    public isBusy(channel: number): boolean {
        return this.channels[channel] != null;
    }

    public pause(channel: number): void {
        const c = this.channels[channel];
        if (c) c.paused = true;
    }

    public resume(channel: number): void {
        const c = this.channels[channel];
        if (c) c.paused = false;
    }

    public setVolume(channel: number, volume: number): void {
        const c = this.channels[channel];
        if (c) c.volume = volume;
    }

    public stopAll(): void {
        this.channels = this.channels.map(() => null);
    }

    public pauseAll(): void {
        for (const c of this.channels) {
            if (c) c.paused = true;
        }
    }

    public resumeAll(): void {
        for (const c of this.channels) {
            if (c) c.paused = false;
        }
    }

    /** Simulate the end of playback on a channel */
    public finish(channel: number): void {
        this.channels[channel] = null;
    }

    public channelPaths(): (string | null)[] {
        return this.channels.map(c => c?.buffer.path ?? null);
    }
}

/** FileProbe over a fixed list of file paths; a directory exists when it contains a file */
export function memoryProbe(files: string[]): FileProbe {
    const set = new Set(files);
    return {
        exists: (path) => set.has(path) || files.some(f => dirname(f) === path),
        list: (dir) => files.filter(f => dirname(f) === dir).map(f => basename(f)),
    };
}
