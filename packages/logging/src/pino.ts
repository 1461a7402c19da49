import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, CUSTOM_LEVELS, CHANNEL_AS_LEVEL } from './channels.js'

// levelKey exists at runtime but is missing from pino's LoggerOptions typings
type PinoOptionsExt = LoggerOptions & { levelKey?: string }

function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && value in CHANNELS
}

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    let base: Logger

    const options: PinoOptionsExt = {
        levelKey: 'lvl',                          // hide default 'level' from pino-pretty
        level: LOG_LEVEL,
        base: { service },
        customLevels: CUSTOM_LEVELS,
        useOnlyCustomLevels: false,
        formatters: {
            level() { return { lvl: '' } },      // suppress textual level in JSON
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                let ch: LogChannel | undefined

                const first = args[0]
                if (typeof first === 'object' && first !== null) {
                    const tagged: unknown = Reflect.get(first, 'channel')
                    if (isLogChannel(tagged)) ch = tagged
                }

                if (ch) {
                    const meta = CHANNELS[ch]
                    const prefix = `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${String(args[1])}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${String(args[0])}`
                    } else {
                        args.push(prefix)
                    }
                }

                Reflect.apply(method, base, args)
            }
        }
    }

    const destination = PRETTY
        ? pinoPretty({
            translateTime: 'SYS:standard',
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel,lvl'
        })
        : undefined

    base = destination ? pino(options, destination) : pino(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const callCustomLevel = (ch: LogChannel, message: string, extra?: Record<string, unknown>): void => {
        const custom: unknown = Reflect.get(base, ch)
        const obj = extra ? { channel: ch, ...extra } : { channel: ch }
        if (typeof custom === 'function') {
            Reflect.apply(custom, base, [obj, message])
        } else {
            base.info(obj, message)
        }
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg: string, extra?: Record<string, unknown>): void => {
            base.debug(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'debug', msg)
        },
        info: (msg: string, extra?: Record<string, unknown>): void => {
            if (CHANNEL_AS_LEVEL) {
                callCustomLevel(ch, msg, extra)
            } else {
                base.info(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            }
            fanout(ch, 'info', msg)
        },
        warn: (msg: string, extra?: Record<string, unknown>): void => {
            base.warn(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'warn', msg)
        },
        error: (msg: string, extra?: Record<string, unknown>): void => {
            base.error(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'error', msg)
        },
        fatal: (msg: string, extra?: Record<string, unknown>): void => {
            base.fatal(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'fatal', msg)
        }
    })

    return { base, channel }
}
