import { debuglog } from 'node:util';

export interface Log {
    debug(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
}

const debug = debuglog('portainer');

// Debug lines are printed when NODE_DEBUG contains "portainer"
export const defaultLog: Log = {
    debug: (message, ...args) => debug(message, ...args),
    warn: (message, ...args) => console.warn(message, ...args),
};

export const silentLog: Log = {
    debug: () => {},
    warn: () => {},
};
