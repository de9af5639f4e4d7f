/**
 * @lapcut/core — layout constants
 *
 * These constants define the binary contract of the `.ld` container.
 * Third-party analysis tools read these offsets directly; none of them is a
 * tuning knob. All multi-byte values are little-endian.
 *
 * The file header occupies the first 1762 bytes:
 *
 *   [0..3]       marker          u32  = LD_MARKER (0x40)
 *   [8..11]      catalog_ptr     u32  → first channel record
 *   [12..15]     data_ptr        u32  → first sample byte
 *   [36..39]     event_ptr       u32  → session event block (0 = none)
 *   [64..69]     static words    3 × u16
 *   [70..73]     device_serial   u32
 *   [74..81]     device_type     char[8]
 *   [82..83]     device_version  u16
 *   [84..85]     static word     u16
 *   [86..89]     channel_count   u32
 *   [94..109]    date            char[16]
 *   [126..141]   time            char[16]
 *   [158..221]   driver          char[64]
 *   [222..285]   vehicle         char[64]
 *   [350..413]   venue           char[64]
 *   [1502..1505] pro_logging     u32
 *   [1572..1635] short_comment   char[64]
 *
 * Every byte not listed is reserved and carried through verbatim.
 */

// ─── Magic ────────────────────────────────────────────────────────────────────

/** First u32 of every container. */
export const LD_MARKER = 0x40;

// ─── Header Layout ────────────────────────────────────────────────────────────

export const HEADER_SIZE = 1762; // bytes

export const OFFSET_MARKER         =    0; // u32
export const OFFSET_CATALOG_PTR    =    8; // u32
export const OFFSET_DATA_PTR       =   12; // u32
export const OFFSET_EVENT_PTR      =   36; // u32
export const OFFSET_STATIC_A       =   64; // u16
export const OFFSET_STATIC_B       =   66; // u16
export const OFFSET_STATIC_C       =   68; // u16
export const OFFSET_DEVICE_SERIAL  =   70; // u32
export const OFFSET_DEVICE_TYPE    =   74; // char[8]
export const OFFSET_DEVICE_VERSION =   82; // u16
export const OFFSET_STATIC_D       =   84; // u16
export const OFFSET_CHANNEL_COUNT  =   86; // u32
export const OFFSET_DATE           =   94; // char[16]
export const OFFSET_TIME           =  126; // char[16]
export const OFFSET_DRIVER         =  158; // char[64]
export const OFFSET_VEHICLE        =  222; // char[64]
export const OFFSET_VENUE          =  350; // char[64]
export const OFFSET_PRO_LOGGING    = 1502; // u32
export const OFFSET_SHORT_COMMENT  = 1572; // char[64]

export const WIDTH_DEVICE_TYPE   =  8;
export const WIDTH_DATE          = 16;
export const WIDTH_TIME          = 16;
export const WIDTH_DRIVER        = 64;
export const WIDTH_VEHICLE       = 64;
export const WIDTH_VENUE         = 64;
export const WIDTH_SHORT_COMMENT = 64;

/**
 * Values the logging device writes into fields whose meaning is unknown.
 * Used only when a header is built from scratch; a header that was read
 * keeps whatever its template holds.
 */
export const DEFAULT_STATIC_A       = 1;
export const DEFAULT_STATIC_B       = 0x4240;
export const DEFAULT_STATIC_C       = 0xf;
export const DEFAULT_DEVICE_SERIAL  = 0x1f44;
export const DEFAULT_DEVICE_TYPE    = 'ADL';
export const DEFAULT_DEVICE_VERSION = 420;
export const DEFAULT_STATIC_D       = 0xadb0;
export const DEFAULT_PRO_LOGGING    = 0xc81a4;

// ─── Session Blocks ───────────────────────────────────────────────────────────
//
// event_ptr → Event; Event.venue_ptr → Venue; Venue.vehicle_ptr → Vehicle.
// The two inner pointers are u16, so the chain must sit in the first 64 KiB.

export const EVENT_SIZE               = 1154;
export const OFFSET_EVENT_NAME        =    0; // char[64]
export const OFFSET_EVENT_SESSION     =   64; // char[64]
export const OFFSET_EVENT_COMMENT     =  128; // char[1024]
export const OFFSET_EVENT_VENUE_PTR   = 1152; // u16
export const WIDTH_EVENT_NAME         =   64;
export const WIDTH_EVENT_SESSION      =   64;
export const WIDTH_EVENT_COMMENT      = 1024;

export const VENUE_SIZE               = 1100;
export const OFFSET_VENUE_NAME        =    0; // char[64]
export const OFFSET_VENUE_VEHICLE_PTR = 1098; // u16
export const WIDTH_VENUE_NAME         =   64;

export const VEHICLE_SIZE             = 260;
export const OFFSET_VEHICLE_ID        =   0; // char[64]
export const OFFSET_VEHICLE_WEIGHT    = 192; // u32
export const OFFSET_VEHICLE_TYPE      = 196; // char[32]
export const OFFSET_VEHICLE_COMMENT   = 228; // char[32]
export const WIDTH_VEHICLE_ID         =  64;
export const WIDTH_VEHICLE_TYPE       =  32;
export const WIDTH_VEHICLE_COMMENT    =  32;

/** Largest offset an Event/Venue u16 pointer can express. */
export const MAX_SHORT_PTR = 0xffff;

// ─── Channel Records ──────────────────────────────────────────────────────────

/**
 * One catalog entry per channel. Records form a doubly linked list through
 * prev/next; the header's catalog_ptr names the head, next = 0 ends it.
 */
export const CHANNEL_RECORD_SIZE = 124;

export const OFFSET_CH_PREV_PTR     =  0; // u32
export const OFFSET_CH_NEXT_PTR     =  4; // u32
export const OFFSET_CH_DATA_PTR     =  8; // u32
export const OFFSET_CH_SAMPLE_COUNT = 12; // u32
export const OFFSET_CH_COUNTER      = 16; // u16
export const OFFSET_CH_TYPE_CLASS   = 18; // u16
export const OFFSET_CH_TYPE_WIDTH   = 20; // u16
export const OFFSET_CH_FREQUENCY    = 22; // u16, Hz
export const OFFSET_CH_SHIFT        = 24; // i16
export const OFFSET_CH_MULTIPLIER   = 26; // i16
export const OFFSET_CH_SCALE        = 28; // i16
export const OFFSET_CH_DECIMALS     = 30; // i16
export const OFFSET_CH_NAME         = 32; // char[32]
export const OFFSET_CH_SHORT_NAME   = 64; // char[8]
export const OFFSET_CH_UNIT         = 72; // char[12]

export const WIDTH_CH_NAME       = 32;
export const WIDTH_CH_SHORT_NAME =  8;
export const WIDTH_CH_UNIT       = 12;

/** Type-class codes. Integers appear under three codes; floats under one. */
export const TYPE_CLASS_INT_CODES: readonly number[] = [0x00, 0x03, 0x05];
export const TYPE_CLASS_FLOAT       = 0x07;
export const DEFAULT_TYPE_CLASS_INT = 0x03;
