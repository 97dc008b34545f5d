/**
 * Tiny structured logger with namespaces.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=si-cli  -> service tag (optional)
 *
 * Any of these can be overridden per instance through `createLogger`.
 */

export type LevelName = "trace" | "debug" | "info" | "warn" | "error";

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

/** Receives one formatted line per entry. */
export type LogSink = (level: LevelName, line: string) => void;

export interface LoggerOptions {
    enabled?: boolean;
    level?: LevelName;
    json?: boolean;
    service?: string;
    sink?: LogSink;
    /** Omits the timestamp tag in text mode. */
    plain?: boolean;
}

const LEVELS: Record<LevelName, number> = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

export function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function envLevel(): LevelName {
    const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
    return isLevelName(raw) ? raw : "info";
}

const consoleSink: LogSink = (level, line) => {
    if (LEVELS[level] >= LEVELS.error) {
        console.error(line);
    } else if (LEVELS[level] >= LEVELS.warn) {
        console.warn(line);
    } else {
        console.log(line);
    }
};

function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = { ...err };
        delete extra.message;
        delete extra.name;
        delete extra.stack;
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
        };
    }
    return err;
}

function serializeMeta(meta: LogMeta): LogMeta {
    return {
        ...meta,
        ...(meta.error ? { error: serializeError(meta.error) } : {}),
        ...(meta.err ? { err: serializeError(meta.err) } : {}),
    };
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.join(":");
    return String(ns);
}

function baseLog(opts: Required<LoggerOptions>, ns?: string | string[]): Logger {
    const namespace = joinNamespace(ns);
    const minLevel = LEVELS[opts.level];

    const write = (lvl: LevelName, msg: unknown, meta?: LogMeta) => {
        if (!opts.enabled || LEVELS[lvl] < minLevel) return;

        const ts = new Date().toISOString();
        const text = String(msg ?? "");

        if (opts.json) {
            const serialized = meta ? serializeMeta(meta) : undefined;
            const payload = {
                ts,
                level: lvl,
                ns: namespace || undefined,
                service: opts.service || undefined,
                pid: process.pid,
                msg: text,
                ...(serialized ? { meta: serialized } : {}),
            };
            opts.sink(lvl, safeStringify(payload));
            return;
        }

        const tags = [
            !opts.plain && `[${ts}]`,
            opts.service && `[${opts.service}]`,
            `[${lvl.toUpperCase()}]`,
            namespace && `[${namespace}]`,
        ]
            .filter(Boolean)
            .join(" ");

        const tail = meta ? ` ${safeStringify(serializeMeta(meta))}` : "";
        opts.sink(lvl, `${tags} ${text}${tail}`);
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return baseLog(opts, merged);
    };

    return {
        trace: (m, meta) => write("trace", m, meta),
        debug: (m, meta) => write("debug", m, meta),
        info: (m, meta) => write("info", m, meta),
        warn: (m, meta) => write("warn", m, meta),
        error: (m, meta) => write("error", m, meta),
        child,
    };
}

export function createLogger(options: LoggerOptions = {}, ns?: string | string[]): Logger {
    return baseLog(
        {
            enabled: options.enabled ?? process.env.LOG_ENABLED !== "0",
            level: options.level ?? envLevel(),
            json: options.json ?? process.env.LOG_JSON === "1",
            service: options.service ?? (process.env.LOG_SERVICE_NAME || ""),
            sink: options.sink ?? consoleSink,
            plain: options.plain ?? false,
        },
        ns
    );
}
