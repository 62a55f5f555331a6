import env from '../config/env';

/**
 * Debug log line, silenced unless ENABLE_LOGS is "true"
 */
export const ddl = (...args: unknown[]): void => {
    if (env.ENABLE_LOGS === 'true') {
        console.log('[debug]', ...args);
    }
};
