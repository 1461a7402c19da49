import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.driver]:  { emoji: '♟️', color: 'blue' },
    [LogChannel.session]: { emoji: '🔗', color: 'cyan' },
    // Port scanning + transport
    [LogChannel.serial]:  { emoji: '🔌', color: 'yellow' },
    [LogChannel.board]:   { emoji: '🧩', color: 'green' },
    [LogChannel.clock]:   { emoji: '⏱️', color: 'magenta' },
    [LogChannel.events]:  { emoji: '📣', color: 'purple' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.driver]:  30,
    [LogChannel.session]: 30,
    [LogChannel.serial]:  30,
    [LogChannel.board]:   30,
    [LogChannel.clock]:   30,
    [LogChannel.events]:  30,
}
