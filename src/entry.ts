import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

/** True when the module at `moduleUrl` is the script node was started with. */
export function isMainModule(moduleUrl: string): boolean {
    const entry = process.argv[1];
    if (!entry) return false;
    try {
        return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(moduleUrl));
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
        throw err;
    }
}
