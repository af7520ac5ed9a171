import type { AttendanceStore } from './services/attendance-store.service';
import type { CommandService } from './services/command.service';
import type { Forwarder } from './services/forwarder.service';
import type { LogNormalizer } from './services/normalizer.service';
import type { PunchLog } from './services/punch-log.service';
import type { PushServer } from './services/push-server.service';
import type { StateStore } from './services/state.service';
import type { StoreLoader } from './services/store-loader.service';

export interface StoreStatus {
    ready: boolean;
    error: string | null;
}

/**
 * Components wired by the coordinator and shared with the admin API
 */
export interface BridgeContext {
    startedAt: Date;
    state: StateStore;
    punchLog: PunchLog;
    normalizer: LogNormalizer;
    commands: CommandService;
    store: AttendanceStore;
    storeStatus: StoreStatus;
    loader: StoreLoader;
    forwarder: Forwarder;
    listeners: PushServer[];
}
