import { LogHandler } from '@/utilities/log-handler';
import { PlayResult, VolumeState } from './audio-definitions';
import { SoundManager } from './sound-manager';

export interface Point {
    x: number;
    y: number;
}

export interface SoundEffectOptions {
    /** Random source for group playback. Overridable for testing. */
    random?: () => number;
    /** Screen width in pixels, used for stereo panning of spatial sounds. Default: 800. */
    screenWidth?: number;
}

export interface SoundEffectStatus {
    loadedSounds: number;
    playingNow: number;
    volume: VolumeState;
    availableChannels: number;
}

/** Default gap between two sounds of a sequence, in seconds */
const SEQUENCE_GAP = 0.1;

/** Quietest volume a spatial sound is played at while in range */
const MIN_SPATIAL_VOLUME = 0.1;

/**
 * Convenience calls for the game screens on top of a SoundManager.
 */
export class SoundEffect<TBuffer> {
    private static log = new LogHandler('SoundEffect');

    private readonly random: () => number;
    private readonly screenWidth: number;

    constructor(
        private readonly manager: SoundManager<TBuffer>,
        options: SoundEffectOptions = {}
    ) {
        this.random = options.random ?? Math.random;
        this.screenWidth = options.screenWidth ?? 800;
    }

    public playClick(volume = 1.0): boolean {
        return this.manager.play('click', volume).ok;
    }

    public playSelect(volume = 1.0): boolean {
        return this.manager.play('select', volume).ok;
    }

    public playHover(volume = 0.7): boolean {
        return this.manager.play('hover', volume).ok;
    }

    public playConfirm(volume = 1.0): boolean {
        return this.manager.play('confirm', volume).ok;
    }

    public playUiSound(name: string, volume = 1.0): boolean {
        return this.manager.play(name, volume).ok;
    }

    /**
     * Play a random loaded sound of a group.
     * Returns the name of the sound played, or null.
     */
    public playRandomFromGroup(group: string, volume = 1.0): string | null {
        const members = this.manager.getGroup(group);
        if (!members) {
            SoundEffect.log.warn(`Unknown sound group: ${group}`);
            return null;
        }

        const available = members.filter(name => this.manager.isLoaded(name));
        if (available.length === 0) {
            return null;
        }

        const index = Math.min(available.length - 1, Math.floor(this.random() * available.length));
        const selected = available[index];
        return this.manager.play(selected, volume).ok ? selected : null;
    }

    /**
     * Play sounds one after another.
     * @param delays Gap before each following sound, in seconds; missing entries default to 0.1
     * Returns a function that cancels the sounds not yet started.
     */
    public playSequence(names: string[], delays: number[] = [], volume = 1.0): () => void {
        const timers: ReturnType<typeof setTimeout>[] = [];

        let offset = 0;
        names.forEach((name, i) => {
            if (i > 0) {
                offset += delays[i - 1] ?? SEQUENCE_GAP;
            }

            const delayMs = Math.round(offset * 1000);
            if (delayMs <= 0) {
                this.manager.play(name, volume);
                return;
            }
            timers.push(setTimeout(() => {
                if (!this.manager.isInitialized) {
                    SoundEffect.log.debug(`Audio shut down, skipping queued sound ${name}`);
                    return;
                }
                this.manager.play(name, volume);
            }, delayMs));
        });

        return () => {
            for (const timer of timers) {
                clearTimeout(timer);
            }
            timers.length = 0;
        };
    }

    /**
     * Play a sound attenuated by its distance to the listener and panned left/right.
     * Returns null when the source is out of range.
     */
    public playSpatial(name: string, position: Point, listener: Point, maxDistance = 500.0): PlayResult | null {
        const dx = position.x - listener.x;
        const dy = position.y - listener.y;
        const distance = Math.sqrt(dx * dx + dy * dy);

        if (distance >= maxDistance) {
            return null;
        }

        const volume = Math.max(MIN_SPATIAL_VOLUME, 1.0 - distance / maxDistance);
        const pan = Math.max(-1, Math.min(1, dx / (this.screenWidth / 2)));

        return this.manager.play(name, volume, { pan });
    }

    public preload(names: string[]): void {
        for (const name of names) {
            if (!this.manager.isLoaded(name)) {
                this.manager.loadAsset(name);
            }
        }
    }

    public stopAll(): void {
        this.manager.stopAll();
    }

    public pauseAll(): void {
        this.manager.pauseAll();
    }

    public resumeAll(): void {
        this.manager.resumeAll();
    }

    public setVolume(volume: Partial<VolumeState>): void {
        if (volume.master !== undefined) {
            this.manager.setMasterVolume(volume.master);
        }
        if (volume.sfx !== undefined) {
            this.manager.setEffectsVolume(volume.sfx);
        }
    }

    public getVolume(): VolumeState {
        return this.manager.getVolume();
    }

    public getStatus(): SoundEffectStatus {
        return {
            loadedSounds: this.manager.loadedCount,
            playingNow: this.manager.getPlayingNames().size,
            volume: this.getVolume(),
            availableChannels: this.manager.channelCount - this.manager.activeCount,
        };
    }
}
