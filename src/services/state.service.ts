import fs from 'fs';
import { z } from 'zod';
import { writeFileAtomic } from '../utils/atomic-file';
import { Mutex } from '../utils/mutex';
import { errorCode } from '../utils/errors';
import logger from '../utils/logger';

/** first command id handed out on a fresh install */
export const INITIAL_COMMAND_ID = 1000;

const bridgeStateSchema = z.object({
    commandCounter: z.number().int().positive().default(INITIAL_COMMAND_ID),
    processingCursor: z.number().int().nonnegative().default(0),
    lastAckedCommandId: z.number().int().positive().nullable().default(null),
});

export type BridgeState = z.infer<typeof bridgeStateSchema>;

/**
 * Small durable document holding the command-id counter and the
 * ProcessingCursor. Updates are serialized and replace the file atomically;
 * the in-memory copy changes only after the write succeeds.
 */
export class StateStore {
    private state: BridgeState = bridgeStateSchema.parse({});
    private readonly mutex = new Mutex();

    constructor(private readonly filePath: string) {}

    async load(): Promise<BridgeState> {
        let content: string;
        try {
            content = await fs.promises.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                logger.info('State file not found, starting from defaults', { file: this.filePath });
                return this.state;
            }
            throw error;
        }

        const parsed = bridgeStateSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
            throw new Error(`Invalid state file ${this.filePath}: ${parsed.error.message}`);
        }
        this.state = parsed.data;
        logger.info('State loaded', { file: this.filePath, ...this.state });
        return this.state;
    }

    get(): Readonly<BridgeState> {
        return this.state;
    }

    update(mutate: (current: Readonly<BridgeState>) => BridgeState): Promise<BridgeState> {
        return this.mutex.run(async () => {
            const next = bridgeStateSchema.parse(mutate(this.state));
            await writeFileAtomic(this.filePath, JSON.stringify(next, null, 2));
            this.state = next;
            return next;
        });
    }

    /**
     * Hand out the next command id; the counter is persisted before the id is returned.
     */
    async nextCommandId(): Promise<number> {
        let issued = 0;
        await this.update(current => {
            issued = current.commandCounter;
            return { ...current, commandCounter: current.commandCounter + 1 };
        });
        return issued;
    }

    /**
     * Move the cursor forward. Never moves it back.
     */
    advanceCursor(to: number): Promise<BridgeState> {
        return this.update(current => ({
            ...current,
            processingCursor: Math.max(current.processingCursor, to),
        }));
    }

    recordCommandAck(commandId: number): Promise<BridgeState> {
        return this.update(current => ({
            ...current,
            lastAckedCommandId: Math.max(current.lastAckedCommandId ?? 0, commandId),
        }));
    }
}
