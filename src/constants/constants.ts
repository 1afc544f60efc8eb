// src/constants/constants.ts

// --- Modbus TCP (MBAP) ---

/** MBAP header: 2-byte transaction id, 2-byte protocol id, 2-byte length, 1-byte unit id */
export const MBAP_LENGTH = 7;

/**
 * Bytes the MBAP length field does not count. The unit id sits inside the MBAP
 * but after the length field, so this is one less than MBAP_LENGTH.
 */
export const MBAP_EXCLUDED_LENGTH = 6;

export const TCP_ADU_MAX_LENGTH = 260;
export const TCP_PDU_MAX_LENGTH = 253;
export const TCP_PROTOCOL_ID = 0x0000;

// --- Modbus RTU ---

export const RTU_ADU_MAX_LENGTH = 256;
export const RTU_ADDRESS_LENGTH = 1;
export const RTU_CHECK_LENGTH = 2;

// --- Framer ---

/**
 * Capacity of the framer's receive buffer: the largest ADU of every transport
 * built into the package. Add new transports here.
 */
export const RECV_BUFFER_LENGTH = Math.max(TCP_ADU_MAX_LENGTH, RTU_ADU_MAX_LENGTH);

// --- Coils ---

export const COILS_PER_BYTE = 8;

/**
 * Framing error kinds
 */
export enum FramingErrorKind {
  NOT_ENOUGH_DATA = 'NotEnoughData',
  BAD_LENGTH = 'BadLength',
  BAD_ERROR_CHECK = 'BadErrorCheck',
  BAD_FUNC_CODE = 'BadFuncCode',
}

export const FRAMING_ERROR_MESSAGES: Record<FramingErrorKind, string> = {
  [FramingErrorKind.NOT_ENOUGH_DATA]: 'Not enough data',
  [FramingErrorKind.BAD_LENGTH]: 'Bad length',
  [FramingErrorKind.BAD_ERROR_CHECK]: 'Bad error check',
  [FramingErrorKind.BAD_FUNC_CODE]: 'Bad function code',
};
