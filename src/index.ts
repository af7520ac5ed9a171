import type { Server } from 'http';
import type { ScheduledTask } from 'node-cron';
import config from './utils/config';
import logger from './utils/logger';
import { errorMessage } from './utils/errors';
import { createApp } from './app';
import type { BridgeContext, StoreStatus } from './context';
import { StateStore } from './services/state.service';
import { PunchLog } from './services/punch-log.service';
import { LogNormalizer } from './services/normalizer.service';
import { CommandService } from './services/command.service';
import { AttendanceStore } from './services/attendance-store.service';
import { RemoteApiService } from './services/remote-api.service';
import { StoreLoader } from './services/store-loader.service';
import { Forwarder } from './services/forwarder.service';
import { PushServer } from './services/push-server.service';
import { createDeviceHandler } from './controllers/device.controller';
import { startStoreLoaderJob } from './jobs/store-loader.job';
import { startForwardJob } from './jobs/forward.job';
import { startLogRetentionJob } from './jobs/log-retention.job';
import { startCommandCycleJob } from './jobs/command-cycle.job';

/**
 * Wire every component, open the device listeners and start the jobs
 */
async function bootstrap(): Promise<{ ctx: BridgeContext; tasks: ScheduledTask[]; server: Server }> {
    const state = new StateStore(config.storage.stateFile);
    await state.load();

    const punchLog = new PunchLog(config.storage.punchLogFile);
    await punchLog.open();

    const normalizer = new LogNormalizer(punchLog);
    await normalizer.hydrate();

    const commands = new CommandService(state, config.commands.template);

    const store = new AttendanceStore(config.storage.databaseFile);
    const storeStatus: StoreStatus = { ready: false, error: null };
    try {
        store.ensureSchema();
        storeStatus.ready = true;
    } catch (error) {
        // devices keep uploading into the punch log; only loading and forwarding stop
        storeStatus.error = errorMessage(error);
        logger.error('Attendance store unavailable, loader and forwarder disabled', {
            file: config.storage.databaseFile,
            error: storeStatus.error,
        });
    }

    const remoteApi = new RemoteApiService(config.remote);
    const loader = new StoreLoader(punchLog, store, state);
    const forwarder = new Forwarder(store, remoteApi, config.sync.forwardBatchSize);

    const handler = createDeviceHandler({ normalizer, commands });
    const listeners = config.devices.map(endpoint => new PushServer(endpoint, handler, config.gateway));

    const ctx: BridgeContext = {
        startedAt: new Date(),
        state,
        punchLog,
        normalizer,
        commands,
        store,
        storeStatus,
        loader,
        forwarder,
        listeners,
    };

    const bound = await Promise.allSettled(listeners.map(listener => listener.start()));
    const failed = bound.filter(result => result.status === 'rejected').length;
    if (failed === listeners.length) {
        logger.error('No device listener could be started; serving the admin API only');
    } else if (failed > 0) {
        logger.warn(`${failed} of ${listeners.length} device listeners failed to start`);
    }

    // Start cron jobs
    const tasks: ScheduledTask[] = [];
    if (commands.enabled) {
        tasks.push(startCommandCycleJob(commands, config.commands.cycleSchedule));
    } else {
        logger.info('Device command dispatch disabled');
    }
    tasks.push(
        startLogRetentionJob(
            { punchLog, state, normalizer },
            config.storage.retentionDays,
            config.storage.retentionSchedule
        )
    );
    if (storeStatus.ready) {
        tasks.push(startStoreLoaderJob(loader, config.sync.loaderIntervalSeconds));
        tasks.push(startForwardJob(forwarder, config.sync.forwardIntervalSeconds));
    }

    logger.info('All cron jobs started', { jobs: tasks.length });

    const app = createApp(ctx);
    const server = app.listen(config.port, () => {
        logger.info(`Attendance Push Bridge admin API started on port ${config.port}`, {
            nodeEnv: config.nodeEnv,
            devices: config.devices.map(device => device.port),
            remoteUrl: config.remote.url,
            databaseFile: config.storage.databaseFile,
        });
    });

    return { ctx, tasks, server };
}

async function shutdown(signal: string, running: Awaited<ReturnType<typeof bootstrap>>): Promise<void> {
    logger.info(`${signal} received, shutting down gracefully...`);

    for (const task of running.tasks) {
        task.stop();
    }
    await Promise.allSettled(running.ctx.listeners.map(listener => listener.stop()));
    await new Promise<void>(resolve => running.server.close(() => resolve()));

    logger.info('Shutdown complete');
    process.exit(0);
}

// Unhandled rejection handler
process.on('unhandledRejection', reason => {
    logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
});

bootstrap()
    .then(running => {
        // Graceful shutdown
        process.on('SIGTERM', () => {
            void shutdown('SIGTERM', running);
        });
        process.on('SIGINT', () => {
            void shutdown('SIGINT', running);
        });
    })
    .catch(error => {
        logger.error('Bridge failed to start', { error: errorMessage(error) });
        process.exit(1);
    });
