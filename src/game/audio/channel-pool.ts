import { PlaybackInstance } from './audio-definitions';

export interface ChannelAcquisition {
    channelId: number;
    /** Instance removed to make room, if the pool was full */
    evicted: PlaybackInstance | null;
}

/**
 * Fixed-size pool of mixer channels and the playback instances bound to them.
 * A channel is bound to at most one instance at a time.
 */
export class ChannelPool {
    /** Active instances in the order they were bound */
    private instances: PlaybackInstance[] = [];
    private byChannel = new Map<number, PlaybackInstance>();

    constructor(
        private readonly size: number,
        private readonly isBusy: (channelId: number) => boolean
    ) {}

    public get capacity(): number {
        return this.size;
    }

    public get active(): readonly PlaybackInstance[] {
        return this.instances;
    }

    public get freeCount(): number {
        return this.size - this.instances.length;
    }

    /**
     * Pick a channel for a new playback: an unbound idle channel if there is one,
     * otherwise the channel of the oldest instance, which is removed.
     * Returns null only for an empty pool.
     */
    public acquire(): ChannelAcquisition | null {
        if (this.size === 0) {
            return null;
        }

        for (let channelId = 0; channelId < this.size; channelId++) {
            if (!this.byChannel.has(channelId) && !this.isBusy(channelId)) {
                return { channelId, evicted: null };
            }
        }

        const oldest = this.oldest();
        if (oldest) {
            this.release(oldest.channelId);
            return { channelId: oldest.channelId, evicted: oldest };
        }

        // Every channel is busy with sound we no longer track (dropped by reapStale)
        return { channelId: 0, evicted: null };
    }

    public bind(instance: PlaybackInstance): void {
        if (instance.channelId < 0 || instance.channelId >= this.size) {
            throw new Error(`Channel ${instance.channelId} is outside the pool of ${this.size}`);
        }
        if (this.byChannel.has(instance.channelId)) {
            throw new Error(`Channel ${instance.channelId} is already bound`);
        }
        this.instances.push(instance);
        this.byChannel.set(instance.channelId, instance);
    }

    public release(channelId: number): PlaybackInstance | null {
        const instance = this.byChannel.get(channelId);
        if (!instance) return null;
        this.byChannel.delete(channelId);
        this.instances = this.instances.filter(i => i !== instance);
        return instance;
    }

    public get(channelId: number): PlaybackInstance | undefined {
        return this.byChannel.get(channelId);
    }

    public instancesOf(soundName: string): PlaybackInstance[] {
        return this.instances.filter(i => i.soundName === soundName);
    }

    /** Remove instances whose channel finished playing */
    public reapCompleted(): PlaybackInstance[] {
        return this.removeWhere(i => !this.isBusy(i.channelId));
    }

    /** Remove instances started more than maxAge ms before now, busy or not */
    public reapStale(now: number, maxAge: number): PlaybackInstance[] {
        return this.removeWhere(i => now - i.startTime >= maxAge);
    }

    public clear(): PlaybackInstance[] {
        const removed = this.instances;
        this.instances = [];
        this.byChannel.clear();
        return removed;
    }

    private oldest(): PlaybackInstance | null {
        let oldest: PlaybackInstance | null = null;
        for (const instance of this.instances) {
            if (!oldest || instance.startTime < oldest.startTime) {
                oldest = instance;
            }
        }
        return oldest;
    }

    private removeWhere(predicate: (instance: PlaybackInstance) => boolean): PlaybackInstance[] {
        const removed: PlaybackInstance[] = [];
        const kept: PlaybackInstance[] = [];
        for (const instance of this.instances) {
            if (predicate(instance)) {
                removed.push(instance);
                this.byChannel.delete(instance.channelId);
            } else {
                kept.push(instance);
            }
        }
        this.instances = kept;
        return removed;
    }
}
