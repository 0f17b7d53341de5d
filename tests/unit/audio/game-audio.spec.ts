import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('howler', async () => {
    const { MockHowl } = await import('../helpers/mock-howl');
    return { Howl: MockHowl, Howler: { ctx: { state: 'running' } } };
});

// Must import after mock setup
import { createGameAudio, GameAudio, LoadFailure } from '@/game/audio';
import { MockHowl } from '../helpers/mock-howl';
import { memoryProbe } from '../helpers/fake-mixer';

describe('createGameAudio', () => {
    let audio: GameAudio;

    beforeEach(() => {
        MockHowl.reset();
        audio = createGameAudio({
            settings: { sfxPath: 'sfx', channelCount: 4 },
            fileProbe: memoryProbe(['sfx/click.wav', 'sfx/move.wav', 'sfx/move_soft.ogg']),
            random: () => 0.9,
        });
    });

    afterEach(() => {
        audio.manager.cleanup();
    });

    it('should load the bundled sound table from the sfx directory', () => {
        expect(audio.manager.isInitialized).toBe(true);
        expect(audio.manager.channelCount).toBe(4);
        expect(audio.manager.loadedCount).toBe(3);
        expect(MockHowl.created.map(h => h.options.src[0])).toEqual([
            'sfx/click.wav',
            'sfx/move.wav',
            'sfx/move_soft.ogg',
        ]);
        expect(audio.manager.loadAsset('capture')).toEqual({ ok: false, reason: LoadFailure.NotFound });
    });

    it('should play through Howler', () => {
        expect(audio.effects.playClick()).toBe(true);
        expect(MockHowl.created[0]?.play).toHaveBeenCalledTimes(1);
        expect(audio.manager.getPlayingNames()).toEqual(new Set(['click']));
    });

    it('should pick group members with the given random source', () => {
        expect(audio.effects.playRandomFromGroup('piece_move')).toBe('move_soft');
    });

    it('should unload every Howl on cleanup', () => {
        audio.manager.cleanup();
        expect(MockHowl.created.every(h => h.unload.mock.calls.length === 1)).toBe(true);
    });
});
