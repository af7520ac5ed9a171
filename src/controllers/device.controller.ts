import type { LogNormalizer } from '../services/normalizer.service';
import type { CommandService } from '../services/command.service';
import type { ConnectionContext, DeviceReply, PushRequestHandler } from '../services/push-server.service';
import {
    buildOptionsDocument,
    classifyRequest,
    extractSerial,
    parseCommandResults,
    queryValue,
} from '../utils/push-protocol';
import type { OptionsDocumentSettings, PushRequest } from '../utils/push-protocol';
import { UNKNOWN_DEVICE_SERIAL } from '../types/punch';
import logger from '../utils/logger';

export interface DeviceControllerDeps {
    normalizer: LogNormalizer;
    commands: CommandService;
    options?: OptionsDocumentSettings;
}

const ACK: DeviceReply = { body: 'OK' };

/**
 * Devices sharing a port are told apart by serial; without one, the port
 * stands for the device.
 */
export function deviceKey(serial: string, context: ConnectionContext): string {
    return serial !== UNKNOWN_DEVICE_SERIAL ? serial : `port:${context.endpoint.port}`;
}

/**
 * Poll for a pending command
 */
async function handlePoll(request: PushRequest, serial: string, context: ConnectionContext, deps: DeviceControllerDeps): Promise<DeviceReply> {
    // INFO polls report device details; they never get a command
    if (queryValue(request.query, 'INFO') !== null) {
        logger.debug('Device info report', { serial, info: queryValue(request.query, 'INFO') });
        return ACK;
    }

    const command = await deps.commands.nextCommand(deviceKey(serial, context));
    return command ? { body: command } : ACK;
}

/**
 * ATTLOG upload: acknowledge first, normalize after the reply is sent
 */
function handleAttlog(request: PushRequest, serial: string, context: ConnectionContext, deps: DeviceControllerDeps): DeviceReply {
    if (!request.body.trim()) {
        logger.warn('ATTLOG upload without body', { serial, port: context.endpoint.port });
        return ACK;
    }

    return {
        body: 'OK',
        afterReply: async () => {
            await deps.normalizer.ingest(request.body, {
                serial: serial !== UNKNOWN_DEVICE_SERIAL ? serial : undefined,
                label: context.endpoint.label,
                port: context.endpoint.port,
                peer: context.peer,
            });
        },
    };
}

async function handleCommandResult(request: PushRequest, serial: string, context: ConnectionContext, deps: DeviceControllerDeps): Promise<DeviceReply> {
    const results = parseCommandResults(request.body);
    if (results.length === 0) {
        logger.warn('Command result without a readable ID/Return', { serial, body: request.body.slice(0, 200) });
        return ACK;
    }
    await deps.commands.acknowledge(results, deviceKey(serial, context));
    return ACK;
}

export function createDeviceHandler(deps: DeviceControllerDeps): PushRequestHandler {
    return async (request, context) => {
        const kind = classifyRequest(request);
        const serial = extractSerial(request);

        switch (kind) {
            case 'poll':
                return handlePoll(request, serial, context, deps);
            case 'attlog':
                return handleAttlog(request, serial, context, deps);
            case 'admin-upload':
                logger.info('Administrative upload acknowledged', {
                    serial,
                    table: queryValue(request.query, 'table'),
                    bytes: request.body.length,
                });
                return ACK;
            case 'options':
                logger.info('Device requested options', { serial, port: context.endpoint.port });
                return { body: buildOptionsDocument(serial, deps.options) };
            case 'command-result':
                return handleCommandResult(request, serial, context, deps);
            default:
                logger.debug('Unrecognized device request, acknowledging', {
                    method: request.method,
                    path: request.path,
                    serial,
                });
                return ACK;
        }
    };
}
