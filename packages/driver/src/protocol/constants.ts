/* -------------------------------------------------------------------------- */
/*  DGT serial protocol constants                                             */
/*                                                                            */
/*  Board -> PC messages carry bit 7 set on the tag byte, followed by a       */
/*  14-bit total size split across two 7-bit bytes.                           */
/* -------------------------------------------------------------------------- */

export const MESSAGE_BIT = 0x80
export const HEADER_SIZE = 3
/** Largest size expressible in two 7-bit size bytes. */
export const MAX_FRAME_SIZE = 0x3fff

export const DEFAULT_BAUD_RATE = 9600

/** PC -> board command bytes. */
export const Command = {
  SEND_RESET: 0x40,
  SEND_CLK: 0x41,
  SEND_BRD: 0x42,
  SEND_UPDATE: 0x43,
  SEND_UPDATE_BRD: 0x44,
  RETURN_SERIALNR: 0x45,
  RETURN_BUSADRES: 0x46,
  SEND_TRADEMARK: 0x47,
  SEND_UPDATE_NICE: 0x4b,
  SEND_BATTERY_STATUS: 0x4c,
  SEND_VERSION: 0x4d,
  RETURN_LONG_SERIALNR: 0x55,
  CLOCK_MESSAGE: 0x2b,
} as const

/** Board -> PC message tags (MESSAGE_BIT already applied). */
export const Message = {
  BOARD_DUMP: MESSAGE_BIT | 0x06,
  BWTIME: MESSAGE_BIT | 0x0d,
  FIELD_UPDATE: MESSAGE_BIT | 0x0e,
  EE_MOVES: MESSAGE_BIT | 0x0f,
  BUSADRES: MESSAGE_BIT | 0x10,
  SERIALNR: MESSAGE_BIT | 0x11,
  TRADEMARK: MESSAGE_BIT | 0x12,
  VERSION: MESSAGE_BIT | 0x13,
  BATTERY_STATUS: MESSAGE_BIT | 0x20,
  LONG_SERIALNR: MESSAGE_BIT | 0x22,
} as const

export type MessageTag = (typeof Message)[keyof typeof Message]

/** Payload sizes the decoders expect (header excluded). */
export const PayloadSize = {
  BOARD_DUMP: 64,
  BWTIME: 7,
  FIELD_UPDATE: 2,
  SERIALNR: 5,
  VERSION: 2,
  LONG_SERIALNR: 10,
} as const

/* -------------------------------------------------------------------------- */
/*  Clock messages (tunnelled through CLOCK_MESSAGE)                           */
/* -------------------------------------------------------------------------- */

export const ClockCommand = {
  BUTTON: 0x08,
  VERSION: 0x09,
  SETNRUN: 0x0a,
  BEEP: 0x0b,
  ASCII: 0x0c,
} as const

export type ClockCommandCode = (typeof ClockCommand)[keyof typeof ClockCommand]

export const CLOCK_START_MESSAGE = 0x03
export const CLOCK_END_MESSAGE = 0x00
/** Marker in the low nibble of BWTIME byte 0 or 3 that turns it into an ack. */
export const CLOCK_ACK_MARKER = 0x0a
export const CLOCK_ACK_OK = 0x10
/** ack1 value reporting a button press rather than a command ack. */
export const CLOCK_ACK_BUTTON = 0x88
/** Beep and ASCII durations are expressed in these units. */
export const CLOCK_BEEP_UNIT_MS = 64
export const CLOCK_TEXT_WIDTH = 8

/** Button codes reported in ack3, mapped to button numbers 0..4 (left to right). */
export const CLOCK_BUTTONS: Readonly<Record<number, number>> = {
  0x31: 0,
  0x32: 1,
  0x33: 2,
  0x34: 3,
  0x35: 4,
}

/* -------------------------------------------------------------------------- */
/*  Pieces                                                                    */
/* -------------------------------------------------------------------------- */

export const EMPTY = 0x00

/** Index = piece code. Codes 13..15 (and anything unknown) render as `?`. */
export const PIECE_CHARS = ' PRNBKQprnbkq???'
