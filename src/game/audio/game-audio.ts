import { Howl } from 'howler';
import { LogHandler } from '@/utilities/log-handler';
import { HowlerMixer } from './howler-mixer';
import { SoundEffect, SoundEffectOptions } from './sound-effect';
import { SoundManager, SoundManagerOptions } from './sound-manager';

const log = new LogHandler('GameAudio');

export interface GameAudio {
    manager: SoundManager<Howl>;
    effects: SoundEffect<Howl>;
}

export type GameAudioOptions = Omit<SoundManagerOptions<Howl>, 'mixer'> & SoundEffectOptions;

/**
 * Create and initialize the audio layer of the game on Howler.
 * The caller owns the result and calls manager.cleanup() on shutdown.
 */
export function createGameAudio(options: GameAudioOptions = {}): GameAudio {
    const { random, screenWidth, ...managerOptions } = options;

    const manager = new SoundManager<Howl>({ ...managerOptions, mixer: new HowlerMixer() });
    const results = manager.init();

    const failed = [...results].filter(([, result]) => !result.ok).map(([name]) => name);
    if (failed.length > 0) {
        log.warn(`Sounds unavailable: ${failed.join(', ')}`);
    }

    return {
        manager,
        effects: new SoundEffect(manager, { random, screenWidth }),
    };
}
