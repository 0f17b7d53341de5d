/**
 * Loads the static sound configuration table from YAML.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { SoundCategory, SoundConfig } from './audio-definitions';
import { AudioSettings } from './audio-settings';

export interface SoundTable {
    sounds: Map<string, SoundConfig>;
    groups: Map<string, string[]>;
}

const BUNDLED_TABLE = fileURLToPath(new URL('./data/sounds.yaml', import.meta.url));

const VALID_CATEGORIES: readonly string[] = Object.values(SoundCategory);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a category string from YAML */
function parseCategory(name: unknown, sound: string): SoundCategory {
    for (const category of Object.values(SoundCategory)) {
        if (category === name) return category;
    }
    throw new Error(`Unknown sound category for "${sound}": "${String(name)}". Valid categories: ${VALID_CATEGORIES.join(', ')}`);
}

function parseNumber(value: unknown, field: string, sound: string, fallback: number): number {
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new Error(`Invalid ${field} for "${sound}": expected a number, got ${JSON.stringify(value)}`);
    }
    return value;
}

function parseSoundConfig(sound: string, raw: unknown, settings: AudioSettings): SoundConfig {
    if (!isRecord(raw)) {
        throw new Error(`Invalid entry for sound "${sound}": expected a mapping`);
    }

    const volume = parseNumber(raw.volume, 'volume', sound, 1.0);
    if (volume < 0 || volume > 1) {
        throw new Error(`Invalid volume for "${sound}": ${volume} (expected 0..1)`);
    }

    const maxInstances = parseNumber(raw.maxInstances, 'maxInstances', sound, settings.maxSoundInstances);
    if (!Number.isInteger(maxInstances) || maxInstances < 1) {
        throw new Error(`Invalid maxInstances for "${sound}": ${maxInstances} (expected an integer >= 1)`);
    }

    const minDelay = parseNumber(raw.minDelay, 'minDelay', sound, settings.minPlayDelay);
    if (minDelay < 0) {
        throw new Error(`Invalid minDelay for "${sound}": ${minDelay} (expected >= 0)`);
    }

    const config: SoundConfig = {
        category: raw.category === undefined ? SoundCategory.Other : parseCategory(raw.category, sound),
        volume,
        maxInstances,
        minDelay,
    };

    const file = raw.file;
    if (file !== undefined) {
        if (typeof file !== 'string' || file.length === 0) {
            throw new Error(`Invalid file for "${sound}": expected a non-empty string`);
        }
        config.file = file;
    }

    return config;
}

/**
 * Parse and validate a sound table.
 */
export function parseSoundTable(yamlText: string, settings: AudioSettings): SoundTable {
    const raw: unknown = parseYaml(yamlText) ?? {};
    if (!isRecord(raw)) {
        throw new Error('Invalid sound table: expected a mapping with "sounds" and "groups"');
    }

    const sounds = new Map<string, SoundConfig>();
    const rawSounds: unknown = raw.sounds ?? {};
    if (!isRecord(rawSounds)) {
        throw new Error('Invalid sound table: "sounds" must be a mapping');
    }
    for (const [name, rawConfig] of Object.entries(rawSounds)) {
        sounds.set(name, parseSoundConfig(name, rawConfig, settings));
    }

    const groups = new Map<string, string[]>();
    const rawGroups: unknown = raw.groups ?? {};
    if (!isRecord(rawGroups)) {
        throw new Error('Invalid sound table: "groups" must be a mapping');
    }
    for (const [group, members] of Object.entries(rawGroups)) {
        if (!Array.isArray(members)) {
            throw new Error(`Invalid sound group "${group}": expected a list of sound names`);
        }
        const names: string[] = [];
        for (const member of members) {
            if (typeof member !== 'string' || !sounds.has(member)) {
                throw new Error(`Unknown sound in group "${group}": "${String(member)}"`);
            }
            names.push(member);
        }
        groups.set(group, names);
    }

    return { sounds, groups };
}

/**
 * Read and parse a sound table file, the bundled one by default.
 */
export function loadSoundTable(settings: AudioSettings, file: string = BUNDLED_TABLE): SoundTable {
    return parseSoundTable(readFileSync(file, 'utf8'), settings);
}

export function emptySoundTable(): SoundTable {
    return { sounds: new Map(), groups: new Map() };
}
