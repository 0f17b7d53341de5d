import { describe, it, expect } from 'vitest';
import { loadSoundTable, parseSoundTable } from '@/game/audio/sound-table';
import { resolveAudioSettings } from '@/game/audio/audio-settings';
import { SoundCategory } from '@/game/audio/audio-definitions';

const settings = resolveAudioSettings({ maxSoundInstances: 4, minPlayDelay: 0.02 });

describe('parseSoundTable', () => {
    it('should parse sounds and groups', () => {
        const table = parseSoundTable(`
sounds:
  move:
    category: piece
    volume: 0.6
    maxInstances: 2
    minDelay: 0.1
  fanfare:
    category: game
    file: jingles/fanfare.ogg
groups:
  moves: [move]
`, settings);

        expect(table.sounds.get('move')).toEqual({
            category: SoundCategory.Piece,
            volume: 0.6,
            maxInstances: 2,
            minDelay: 0.1,
        });
        expect(table.groups.get('moves')).toEqual(['move']);
    });

    it('should fill missing fields with the defaults', () => {
        const table = parseSoundTable('sounds:\n  beep: {}\n', settings);
        expect(table.sounds.get('beep')).toEqual({
            category: SoundCategory.Other,
            volume: 1,
            maxInstances: 4,
            minDelay: 0.02,
        });
    });

    it('should keep an explicit file', () => {
        const table = parseSoundTable('sounds:\n  fanfare:\n    file: jingles/fanfare.ogg\n', settings);
        expect(table.sounds.get('fanfare')?.file).toBe('jingles/fanfare.ogg');
    });

    it('should accept an empty document', () => {
        const table = parseSoundTable('', settings);
        expect(table.sounds.size).toBe(0);
        expect(table.groups.size).toBe(0);
    });

    it('should reject unknown categories', () => {
        expect(() => parseSoundTable('sounds:\n  beep:\n    category: music\n', settings))
            .toThrow('Unknown sound category for "beep": "music". Valid categories: ui, piece, game, other');
    });

    it('should reject out-of-range values', () => {
        expect(() => parseSoundTable('sounds:\n  beep:\n    volume: 1.5\n', settings))
            .toThrow('Invalid volume for "beep": 1.5 (expected 0..1)');
        expect(() => parseSoundTable('sounds:\n  beep:\n    maxInstances: 0\n', settings))
            .toThrow('Invalid maxInstances for "beep": 0 (expected an integer >= 1)');
        expect(() => parseSoundTable('sounds:\n  beep:\n    minDelay: -1\n', settings))
            .toThrow('Invalid minDelay for "beep": -1 (expected >= 0)');
        expect(() => parseSoundTable('sounds:\n  beep:\n    volume: loud\n', settings))
            .toThrow('Invalid volume for "beep": expected a number, got "loud"');
    });

    it('should reject groups naming unknown sounds', () => {
        expect(() => parseSoundTable('sounds:\n  beep: {}\ngroups:\n  all: [beep, boop]\n', settings))
            .toThrow('Unknown sound in group "all": "boop"');
    });
});

describe('loadSoundTable', () => {
    it('should load the bundled table', () => {
        const table = loadSoundTable(settings);

        expect(table.sounds.get('click')).toEqual({
            category: SoundCategory.UI,
            volume: 0.8,
            maxInstances: 3,
            minDelay: 0.05,
        });
        expect(table.sounds.get('win')?.file).toBe('jingles/win.ogg');
        expect(table.groups.get('piece_move')).toEqual(['move', 'move_soft']);
    });
});
