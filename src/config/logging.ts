/**
 * LogEngine Configuration
 *
 * Configures LogEngine once at startup, before the server and bot are built,
 * so every startup line shares the same timestamp format.
 *
 * LOG_LEVEL selects the mode explicitly (debug, info, warn, error, silent).
 * Without it LogEngine derives the mode from NODE_ENV.
 *
 * @since 2025
 */
import { LogEngine, LogMode } from '@wgtechlabs/log-engine';

const LOG_LEVEL_MODES: Record<string, LogMode> = {
    debug: LogMode.DEBUG,
    info: LogMode.INFO,
    warn: LogMode.WARN,
    error: LogMode.ERROR,
    silent: LogMode.SILENT
};

/**
 * Maps a LOG_LEVEL value to a LogEngine mode, or undefined when unset or unknown.
 */
export function resolveLogMode(level: string | undefined): LogMode | undefined {
    if (!level) {
        return undefined;
    }

    const key = level.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(LOG_LEVEL_MODES, key)
        ? LOG_LEVEL_MODES[key]
        : undefined;
}

export function configureLogging(env: NodeJS.ProcessEnv = process.env): void {
    const mode = resolveLogMode(env.LOG_LEVEL);
    const format = {
        includeIsoTimestamp: false,
        includeLocalTime: true
    };

    if (mode === undefined) {
        LogEngine.configure({ format });
    } else {
        LogEngine.configure({ mode, format });
    }
}

export { LogEngine };
