import { Howl } from 'howler';
import { LogHandler } from '@/utilities/log-handler';
import { IMixer, MixerError } from './mixer';

interface ChannelSlot {
    howl: Howl;
    soundId: number;
    paused: boolean;
    onEnd: () => void;
}

/**
 * Mixer on top of Howler.js. Every decoded file is one Howl; a channel is a
 * slot holding one Howl sound id at a time.
 */
export class HowlerMixer implements IMixer<Howl> {
    private static log = new LogHandler('HowlerMixer');

    private slots: (ChannelSlot | null)[] = [];
    /** Howls that reported a load error after decode() returned */
    private failed = new WeakSet<Howl>();

    public get channelCount(): number {
        return this.slots.length;
    }

    public open(channelCount: number): void {
        this.close();
        this.slots = new Array<ChannelSlot | null>(channelCount).fill(null);
        HowlerMixer.log.debug(`Opened ${channelCount} channels`);
    }

    public close(): void {
        this.stopAll();
        this.slots = [];
    }

    public decode(path: string): Howl {
        try {
            const howl: Howl = new Howl({
                src: [path],
                preload: true,
                volume: 1.0,
                onloaderror: (_id, err) => {
                    this.failed.add(howl);
                    HowlerMixer.log.error(`Failed to decode ${path}: ${String(err)}`);
                },
            });
            return howl;
        } catch (e) {
            throw new MixerError('decode', `Cannot decode ${path}: ${e instanceof Error ? e.message : String(e)}`);
        }
    }

    public unload(buffer: Howl): void {
        for (let channel = 0; channel < this.slots.length; channel++) {
            if (this.slots[channel]?.howl === buffer) {
                this.stop(channel);
            }
        }
        buffer.stop();
        buffer.unload();
    }

    public setSoundVolume(buffer: Howl, volume: number): void {
        buffer.volume(volume);
    }

    public play(channel: number, buffer: Howl, volume: number, pan: number): void {
        this.checkChannel(channel);
        if (this.failed.has(buffer)) {
            throw new MixerError('decode', 'Sound data could not be decoded');
        }

        this.stop(channel);

        const soundId = buffer.play();
        buffer.volume(volume, soundId);
        if (pan !== 0) {
            buffer.stereo(pan, soundId);
        }

        const slot: ChannelSlot = {
            howl: buffer,
            soundId,
            paused: false,
            // Frees the slot as soon as Howler reports the end; isBusy() polling covers missed events
            onEnd: () => {
                if (this.slots[channel] === slot) {
                    this.slots[channel] = null;
                }
            },
        };
        this.slots[channel] = slot;
        buffer.once('end', slot.onEnd, soundId);
    }

    public stop(channel: number): void {
        const slot = this.slots[channel];
        if (!slot) return;
        // Howler does not fire 'end' on stop, so the listener would stay registered
        slot.howl.off('end', slot.onEnd, slot.soundId);
        slot.howl.stop(slot.soundId);
        this.slots[channel] = null;
    }

    public isBusy(channel: number): boolean {
        const slot = this.slots[channel];
        if (!slot) return false;
        // A sound played before its Howl finished loading is queued, not yet playing
        return slot.paused || slot.howl.state() === 'loading' || slot.howl.playing(slot.soundId);
    }

    public pause(channel: number): void {
        const slot = this.slots[channel];
        if (!slot || slot.paused) return;
        slot.howl.pause(slot.soundId);
        slot.paused = true;
    }

    public resume(channel: number): void {
        const slot = this.slots[channel];
        if (!slot || !slot.paused) return;
        slot.howl.play(slot.soundId);
        slot.paused = false;
    }

    public setVolume(channel: number, volume: number): void {
        const slot = this.slots[channel];
        if (!slot) return;
        slot.howl.volume(volume, slot.soundId);
    }

    public stopAll(): void {
        for (let channel = 0; channel < this.slots.length; channel++) {
            this.stop(channel);
        }
    }

    public pauseAll(): void {
        for (let channel = 0; channel < this.slots.length; channel++) {
            this.pause(channel);
        }
    }

    public resumeAll(): void {
        for (let channel = 0; channel < this.slots.length; channel++) {
            this.resume(channel);
        }
    }

    private checkChannel(channel: number): void {
        if (!Number.isInteger(channel) || channel < 0 || channel >= this.slots.length) {
            throw new MixerError('playback', `No such channel: ${channel}`);
        }
    }
}
