import { existsSync, readdirSync } from 'fs';
import { extname, isAbsolute, join } from 'path';

/** File-system access used to find sound files */
export interface FileProbe {
    exists(path: string): boolean;
    /** File names (not paths) in a directory; empty when it does not exist */
    list(dir: string): string[];
}

export const nodeFileProbe: FileProbe = {
    exists: (path) => existsSync(path),
    list: (dir) => {
        if (!existsSync(dir)) return [];
        return readdirSync(dir, { withFileTypes: true })
            .filter(entry => entry.isFile())
            .map(entry => entry.name);
    },
};

/**
 * Maps sound names to files below the sfx directory.
 */
export class SoundFileResolver {
    private readonly extensions: string[];

    constructor(
        private readonly sfxPath: string,
        extensions: string[],
        private readonly probe: FileProbe = nodeFileProbe
    ) {
        this.extensions = extensions.map(ext => ext.toLowerCase());
    }

    public get directory(): string {
        return this.sfxPath;
    }

    public exists(path: string): boolean {
        return this.probe.exists(path);
    }

    /**
     * Path for a sound, or null if no file exists.
     * @param file Explicit file from the sound table, relative to the sfx directory
     */
    public resolve(name: string, file?: string): string | null {
        if (file !== undefined) {
            const path = isAbsolute(file) ? file : join(this.sfxPath, file);
            return this.probe.exists(path) ? path : null;
        }

        for (const ext of this.extensions) {
            const path = join(this.sfxPath, name + ext);
            if (this.probe.exists(path)) {
                return path;
            }
        }
        return null;
    }

    /** Default location of a sound, used in messages when nothing was found */
    public expectedPath(name: string, file?: string): string {
        if (file !== undefined) {
            return isAbsolute(file) ? file : join(this.sfxPath, file);
        }
        return join(this.sfxPath, name + this.extensions[0]);
    }

    /**
     * All sound files in the sfx directory, keyed by name (file name without extension).
     * When two files share a name the earlier extension in the list wins.
     */
    public listSoundFiles(): Map<string, string> {
        const found = new Map<string, { path: string; rank: number }>();

        for (const fileName of this.probe.list(this.sfxPath)) {
            const ext = extname(fileName);
            const rank = this.extensions.indexOf(ext.toLowerCase());
            if (rank < 0) continue;

            const name = fileName.slice(0, fileName.length - ext.length);
            const existing = found.get(name);
            if (!existing || rank < existing.rank) {
                found.set(name, { path: join(this.sfxPath, fileName), rank });
            }
        }

        return new Map([...found].sort(([a], [b]) => a.localeCompare(b)).map(([name, { path }]): [string, string] => [name, path]));
    }
}
