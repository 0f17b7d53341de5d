import { LogHandler } from '@/utilities/log-handler';
import { ThrottledLogger } from '@/utilities/throttled-logger';
import {
    clampUnit,
    LoadFailure,
    LoadResult,
    PlaybackInstance,
    PlayFailure,
    PlayOptions,
    PlayResult,
    SoundCategory,
    SoundConfig,
    SoundInfo,
    VolumeState,
} from './audio-definitions';
import { AudioSettings, resolveAudioSettings } from './audio-settings';
import { ChannelPool } from './channel-pool';
import { IMixer, MixerError } from './mixer';
import { FileProbe, SoundFileResolver } from './sound-files';
import { loadSoundTable, SoundTable } from './sound-table';

export interface SoundManagerOptions<TBuffer> {
    mixer: IMixer<TBuffer>;
    /** Overrides for DEFAULT_AUDIO_SETTINGS */
    settings?: Partial<AudioSettings>;
    /** Static sound table. Default: the bundled sounds.yaml */
    soundTable?: SoundTable;
    /** Overridable for testing */
    fileProbe?: FileProbe;
    /** Clock in ms. Overridable for testing. */
    now?: () => number;
}

interface LoadedSound<TBuffer> {
    buffer: TBuffer;
    config: SoundConfig;
    path: string;
    playCount: number;
    /** Clock time of the last successful play start, in ms */
    lastPlayTime: number | null;
}

const OK: LoadResult = { ok: true };

/**
 * Loads sound effects, enforces per-sound rate and concurrency limits, assigns
 * mixer channels, and mixes master/effects volume into every playback.
 *
 * Call update() once per frame to drop finished and stale playbacks.
 */
export class SoundManager<TBuffer> {
    private static log = new LogHandler('SoundManager');

    private readonly mixer: IMixer<TBuffer>;
    private readonly settings: AudioSettings;
    private readonly table: SoundTable;
    private readonly files: SoundFileResolver;
    private readonly now: () => number;
    private readonly throttled: ThrottledLogger;

    private sounds: Map<string, LoadedSound<TBuffer>> = new Map();
    private pool: ChannelPool | null = null;

    private masterVolume: number;
    private sfxVolume: number;

    constructor(options: SoundManagerOptions<TBuffer>) {
        this.mixer = options.mixer;
        this.settings = resolveAudioSettings(options.settings);
        this.table = options.soundTable ?? loadSoundTable(this.settings);
        this.files = new SoundFileResolver(this.settings.sfxPath, this.settings.extensions, options.fileProbe);
        this.now = options.now ?? (() => performance.now());
        this.throttled = new ThrottledLogger(SoundManager.log, 1000, this.now);

        this.masterVolume = this.settings.masterVolume;
        this.sfxVolume = this.settings.sfxVolume;
    }

    public get isInitialized(): boolean {
        return this.pool !== null;
    }

    /**
     * Open the mixer channels and load every sound from the sound table.
     * Calling init() again only loads table entries that are still missing.
     */
    public init(): Map<string, LoadResult> {
        if (!this.pool) {
            if (!this.files.exists(this.files.directory)) {
                SoundManager.log.warn(`Sound directory does not exist: ${this.files.directory}`);
            }
            this.mixer.open(this.settings.channelCount);
            this.pool = new ChannelPool(this.settings.channelCount, (channel) => this.mixer.isBusy(channel));
            SoundManager.log.info(`Audio initialized with ${this.settings.channelCount} channels`);
        } else {
            SoundManager.log.debug('SoundManager already initialized, loading missing sounds only');
        }

        const results = this.loadConfigured();
        SoundManager.log.info(`Loaded ${this.sounds.size} of ${this.table.sounds.size} configured sounds`);
        return results;
    }

    /**
     * Load a single sound. Succeeds immediately when it is already loaded.
     * @param path File to decode; resolved from the sound table or the name when omitted
     * @param config Explicit configuration; the sound table entry or the defaults when omitted
     */
    public loadAsset(name: string, path?: string, config?: Partial<SoundConfig>): LoadResult {
        this.requirePool('loadAsset');

        if (this.sounds.has(name)) {
            SoundManager.log.debug(`Sound already loaded: ${name}`);
            return OK;
        }

        const soundConfig = this.configFor(name, config);
        const filePath = path ?? this.files.resolve(name, soundConfig.file);

        if (filePath === null || !this.files.exists(filePath)) {
            SoundManager.log.warn(`Sound file not found for ${name}: ${filePath ?? this.files.expectedPath(name, soundConfig.file)}`);
            return { ok: false, reason: LoadFailure.NotFound };
        }

        let buffer: TBuffer;
        try {
            buffer = this.mixer.decode(filePath);
            this.mixer.setSoundVolume(buffer, this.baselineVolume(soundConfig));
        } catch (e) {
            SoundManager.log.error(`Failed to load sound ${name}`, toError(e));
            return { ok: false, reason: LoadFailure.DecodeError };
        }

        this.sounds.set(name, {
            buffer,
            config: soundConfig,
            path: filePath,
            playCount: 0,
            lastPlayTime: null,
        });
        SoundManager.log.debug(`Loaded sound ${name} from ${filePath}`);
        return OK;
    }

    /** Load every sound of the sound table; failures are reported per sound */
    public loadConfigured(): Map<string, LoadResult> {
        const results = new Map<string, LoadResult>();
        for (const name of this.table.sounds.keys()) {
            results.set(name, this.loadAsset(name));
        }
        return results;
    }

    /** Load every not yet loaded sound file found in the sfx directory */
    public loadAllFromFolder(): Map<string, LoadResult> {
        const results = new Map<string, LoadResult>();
        for (const [name, path] of this.files.listSoundFiles()) {
            if (!this.sounds.has(name)) {
                results.set(name, this.loadAsset(name, path));
            }
        }
        return results;
    }

    /**
     * Play a sound effect, loading it first if needed.
     * @param requestVolume Multiplier on top of the sound's base volume
     */
    public play(name: string, requestVolume = 1.0, options: PlayOptions = {}): PlayResult {
        const pool = this.requirePool('play');

        let sound = this.sounds.get(name);
        if (!sound) {
            SoundManager.log.warn(`Sound not loaded, trying to load: ${name}`);
            this.loadAsset(name);
            sound = this.sounds.get(name);
            if (!sound) {
                return { ok: false, reason: PlayFailure.NotLoaded };
            }
        }

        const now = this.now();
        pool.reapCompleted();

        const { config } = sound;
        if (sound.lastPlayTime !== null && (now - sound.lastPlayTime) / 1000 < config.minDelay) {
            this.throttled.debug(`rate:${name}`, `Rate limited: ${name}`);
            return { ok: false, reason: PlayFailure.RateLimited };
        }

        if (pool.instancesOf(name).length >= config.maxInstances) {
            this.throttled.debug(`instances:${name}`, `Instance limit of ${config.maxInstances} reached: ${name}`);
            return { ok: false, reason: PlayFailure.ConcurrencyLimited };
        }

        const acquired = pool.acquire();
        if (!acquired) {
            SoundManager.log.warn(`No audio channel available to play ${name}`);
            return { ok: false, reason: PlayFailure.NoChannelAvailable };
        }

        const { channelId, evicted } = acquired;
        if (evicted) {
            this.throttled.debug('evict', `All channels busy, stopping ${evicted.soundName} on channel ${channelId}`);
        }

        const volume = this.channelVolume(config, requestVolume);
        const pan = Math.max(-1, Math.min(1, options.pan ?? 0));

        try {
            this.mixer.stop(channelId);
            this.mixer.play(channelId, sound.buffer, volume, pan);
        } catch (e) {
            return this.handlePlayError(name, sound, e);
        }

        pool.bind({ soundName: name, startTime: now, channelId, requestVolume });
        sound.lastPlayTime = now;
        sound.playCount++;

        return { ok: true, channelId };
    }

    /** Stop every channel */
    public stopAll(): void {
        if (!this.pool) return;
        this.mixer.stopAll();
        this.pool.clear();
    }

    /**
     * Stop every playing instance of a sound.
     * Returns the number of instances stopped.
     */
    public stopSound(name: string): number {
        if (!this.pool) return 0;
        this.pool.reapCompleted();

        const instances = this.pool.instancesOf(name);
        for (const instance of instances) {
            this.mixer.stop(instance.channelId);
            this.pool.release(instance.channelId);
        }
        return instances.length;
    }

    public pauseAll(): void {
        if (!this.pool) return;
        this.mixer.pauseAll();
    }

    public resumeAll(): void {
        if (!this.pool) return;
        this.mixer.resumeAll();
    }

    /** Pause the channels of one sound. Returns the number of instances paused. */
    public pauseSound(name: string): number {
        if (!this.pool) return 0;
        const instances = this.pool.instancesOf(name);
        for (const instance of instances) {
            this.mixer.pause(instance.channelId);
        }
        return instances.length;
    }

    /** Resume the channels of one sound. Returns the number of instances resumed. */
    public resumeSound(name: string): number {
        if (!this.pool) return 0;
        const instances = this.pool.instancesOf(name);
        for (const instance of instances) {
            this.mixer.resume(instance.channelId);
        }
        return instances.length;
    }

    public setMasterVolume(volume: number): void {
        this.masterVolume = clampUnit(volume);
        this.applyVolumes();
    }

    public setEffectsVolume(volume: number): void {
        this.sfxVolume = clampUnit(volume);
        this.applyVolumes();
    }

    public getVolume(): VolumeState {
        return { master: this.masterVolume, sfx: this.sfxVolume };
    }

    /**
     * Drop finished playbacks and any playback older than the staleness bound.
     * Call once per frame.
     */
    public update(): void {
        if (!this.pool) return;
        this.pool.reapCompleted();

        const stale = this.pool.reapStale(this.now(), this.settings.staleInstanceAge * 1000);
        if (stale.length > 0) {
            SoundManager.log.debug(`Dropped ${stale.length} stale playback records`);
        }
    }

    public getInfo(name: string): SoundInfo | null {
        const sound = this.sounds.get(name);
        if (!sound) return null;
        return { ...sound.config, playCount: sound.playCount, isLoaded: true };
    }

    /** Names of the sounds bound to a busy channel */
    public getPlayingNames(): Set<string> {
        const playing = new Set<string>();
        if (!this.pool) return playing;
        for (const instance of this.pool.active) {
            if (this.mixer.isBusy(instance.channelId)) {
                playing.add(instance.soundName);
            }
        }
        return playing;
    }

    public getActiveInstances(): readonly PlaybackInstance[] {
        return this.pool?.active ?? [];
    }

    public isLoaded(name: string): boolean {
        return this.sounds.has(name);
    }

    public get loadedCount(): number {
        return this.sounds.size;
    }

    public get activeCount(): number {
        return this.pool?.active.length ?? 0;
    }

    public get channelCount(): number {
        return this.pool?.capacity ?? 0;
    }

    /** Members of a sound group from the sound table */
    public getGroup(group: string): readonly string[] | undefined {
        return this.table.groups.get(group);
    }

    /**
     * Stop everything, release all sounds and close the mixer.
     * The manager must be initialized again before further use.
     */
    public cleanup(): void {
        if (!this.pool) return;
        this.stopAll();

        for (const [name, sound] of this.sounds) {
            try {
                this.mixer.unload(sound.buffer);
            } catch (e) {
                SoundManager.log.error(`Failed to unload sound ${name}`, toError(e));
            }
        }
        this.sounds.clear();
        this.throttled.reset();

        this.mixer.close();
        this.pool = null;
        SoundManager.log.debug('SoundManager cleaned up');
    }

    private requirePool(operation: string): ChannelPool {
        if (!this.pool) {
            throw new Error(`SoundManager.${operation}() called before init() or after cleanup()`);
        }
        return this.pool;
    }

    private handlePlayError(name: string, sound: LoadedSound<TBuffer>, e: unknown): PlayResult {
        if (e instanceof MixerError && e.kind === 'decode') {
            SoundManager.log.error(`Sound ${name} could not be decoded, unloading it`, e);
            this.sounds.delete(name);
            try {
                this.mixer.unload(sound.buffer);
            } catch (unloadError) {
                SoundManager.log.error(`Failed to unload sound ${name}`, toError(unloadError));
            }
            return { ok: false, reason: PlayFailure.NotLoaded };
        }

        SoundManager.log.error(`Failed to play sound ${name}`, toError(e));
        return { ok: false, reason: PlayFailure.NoChannelAvailable };
    }

    /** Configuration for a sound: the explicit one, the sound table entry, or the defaults */
    private configFor(name: string, explicit?: Partial<SoundConfig>): SoundConfig {
        const base: SoundConfig = this.table.sounds.get(name) ?? {
            category: SoundCategory.Other,
            volume: 1.0,
            maxInstances: this.settings.maxSoundInstances,
            minDelay: this.settings.minPlayDelay,
        };
        if (!explicit) {
            return { ...base };
        }

        const merged: SoundConfig = { ...base, ...explicit };
        const normalized: SoundConfig = {
            ...merged,
            volume: clampUnit(finiteOr(merged.volume, base.volume)),
            maxInstances: Math.max(1, Math.floor(finiteOr(merged.maxInstances, base.maxInstances))),
            minDelay: Math.max(0, finiteOr(merged.minDelay, base.minDelay)),
        };
        if (normalized.volume !== merged.volume
            || normalized.maxInstances !== merged.maxInstances
            || normalized.minDelay !== merged.minDelay) {
            SoundManager.log.warn(`Adjusted out-of-range configuration for ${name}`);
        }
        return normalized;
    }

    private baselineVolume(config: SoundConfig): number {
        return clampUnit(config.volume * this.masterVolume * this.sfxVolume);
    }

    private channelVolume(config: SoundConfig, requestVolume: number): number {
        return clampUnit(config.volume * requestVolume * this.masterVolume * this.sfxVolume);
    }

    /** Re-apply master/effects volume to every sound and every playing channel */
    private applyVolumes(): void {
        for (const sound of this.sounds.values()) {
            this.mixer.setSoundVolume(sound.buffer, this.baselineVolume(sound.config));
        }

        for (const instance of this.getActiveInstances()) {
            const sound = this.sounds.get(instance.soundName);
            if (sound) {
                this.mixer.setVolume(instance.channelId, this.channelVolume(sound.config, instance.requestVolume));
            }
        }
    }
}

function finiteOr(value: number, fallback: number): number {
    return Number.isFinite(value) ? value : fallback;
}

function toError(e: unknown): Error {
    return e instanceof Error ? e : new Error(String(e));
}
