/**
 * logging.ts
 *
 * Lightweight logging helpers used by the client and the gateway bootstrap.
 * Implemented on top of console to keep the library free of a logging
 * framework; any pino-style logger (Fastify's included) can be handed to the
 * client instead. Environment variable `LOG_DEBUG` enables verbose debug logs.
 */

export type LogFn = (obj: object, msg?: string) => void;

/** Minimal pino-compatible logger surface accepted by the client. */
export interface ClientLogger {
    debug: LogFn;
    info: LogFn;
    warn: LogFn;
    error: LogFn;
}

const PREFIX = '[dota2]';

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
    return env.LOG_DEBUG === '1' || env.LOG_DEBUG === 'true';
}

export function debug(obj: object, msg = '') {
    if (isDebugEnabled()) {
        console.log(PREFIX, msg, obj);
    }
}

export function info(obj: object, msg = '') {
    console.log(PREFIX, msg, obj);
}

export function warn(obj: object, msg = '') {
    console.warn(PREFIX, msg, obj);
}

export function error(obj: object, msg = '') {
    console.error(PREFIX, msg, obj);
}

export const consoleLogger: ClientLogger = {debug, info, warn, error};
