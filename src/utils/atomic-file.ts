import fs from 'fs';
import path from 'path';

let tempCounter = 0;

/**
 * Replace `filePath` with `data` so readers see either the old or the new
 * content: write a sibling temp file, fsync it, then rename over the target.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.promises.mkdir(dir, { recursive: true });

    tempCounter += 1;
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${tempCounter}.tmp`);

    const handle = await fs.promises.open(tempPath, 'w');
    try {
        await handle.writeFile(data, 'utf-8');
        await handle.sync();
    } finally {
        await handle.close();
    }

    try {
        await fs.promises.rename(tempPath, filePath);
    } catch (error) {
        await fs.promises.rm(tempPath, { force: true });
        throw error;
    }
}
