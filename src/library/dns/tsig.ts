import {createHmac, timingSafeEqual} from 'crypto';

import * as x from 'x-value';

import {getErrorMessage, trimTrailingDot} from '../@utils/index.js';
import {TSIGVerificationError} from '../errors.js';

import {HEADER_LENGTH} from './message.js';

export const TSIG_FUDGE_DEFAULT = 300;

const TSIG_TYPE = 250;
const TSIG_CLASS = 255;

const NAME_POINTERS_MAX = 64;

export const TSIGAlgorithm = x.union([
  x.literal('hmac-md5'),
  x.literal('hmac-sha1'),
  x.literal('hmac-sha224'),
  x.literal('hmac-sha256'),
  x.literal('hmac-sha384'),
  x.literal('hmac-sha512'),
]);

export type TSIGAlgorithm = x.TypeOf<typeof TSIGAlgorithm>;

const TSIG_ALGORITHMS: Record<TSIGAlgorithm, {name: string; hash: string}> = {
  'hmac-md5': {name: 'hmac-md5.sig-alg.reg.int', hash: 'md5'},
  'hmac-sha1': {name: 'hmac-sha1', hash: 'sha1'},
  'hmac-sha224': {name: 'hmac-sha224', hash: 'sha224'},
  'hmac-sha256': {name: 'hmac-sha256', hash: 'sha256'},
  'hmac-sha384': {name: 'hmac-sha384', hash: 'sha384'},
  'hmac-sha512': {name: 'hmac-sha512', hash: 'sha512'},
};

/**
 * TSIG error field values (RFC 8945 section 3).
 */
export const TSIGError = {
  NOERROR: 0,
  BADSIG: 16,
  BADKEY: 17,
  BADTIME: 18,
  BADTRUNC: 22,
} as const;

export type TSIGKey = {
  name: string;
  secret: Buffer;
  algorithm: TSIGAlgorithm;
};

export type TSIGRecord = {
  algorithm: string;
  /**
   * Seconds since epoch.
   */
  timeSigned: number;
  fudge: number;
  mac: Buffer;
  originalId: number;
  error: number;
  otherData: Buffer;
};

export type TSIGSignOptions = {
  /**
   * MAC of the request this message answers, chained into the digest of
   * responses.
   */
  requestMAC?: Buffer;
  /**
   * Seconds since epoch, defaults to now.
   */
  time?: number;
  fudge?: number;
  error?: number;
};

export type TSIGSignedMessage = {
  data: Buffer;
  mac: Buffer;
};

/**
 * A signed message split at its TSIG record.
 */
export type TSIGSplitMessage = {
  /**
   * The message as it was before signing: bytes up to the TSIG record, with
   * the original ID and ARCOUNT restored.
   */
  unsigned: Buffer;
  /**
   * Byte offset of the TSIG record.
   */
  offset: number;
  keyName: string;
  record: TSIGRecord;
};

export type TSIGVerifyOptions = {
  requestMAC?: Buffer;
  /**
   * Seconds since epoch, defaults to now.
   */
  now?: number;
};

export function getTSIGAlgorithmName(algorithm: TSIGAlgorithm): string {
  return TSIG_ALGORITHMS[algorithm].name;
}

/**
 * Signs an encoded DNS message, returning a copy with the TSIG record
 * appended to the additional section and the computed MAC.
 */
export function signMessage(
  message: Buffer,
  key: TSIGKey,
  {
    requestMAC,
    time = currentTime(),
    fudge = TSIG_FUDGE_DEFAULT,
    error = TSIGError.NOERROR,
  }: TSIGSignOptions = {},
): TSIGSignedMessage {
  const record: Omit<TSIGRecord, 'mac'> = {
    algorithm: getTSIGAlgorithmName(key.algorithm),
    timeSigned: time,
    fudge,
    originalId: message.readUInt16BE(0),
    error,
    otherData: Buffer.alloc(0),
  };

  const mac = computeMAC(message, key, record, requestMAC);

  const signed = Buffer.from(message);

  signed.writeUInt16BE(signed.readUInt16BE(10) + 1, 10);

  const data = encodeTSIGRecordData({...record, mac});

  const fixed = Buffer.alloc(10);

  fixed.writeUInt16BE(TSIG_TYPE, 0);
  fixed.writeUInt16BE(TSIG_CLASS, 2);
  fixed.writeUInt32BE(0, 4);
  fixed.writeUInt16BE(data.length, 8);

  return {
    data: Buffer.concat([signed, encodeCanonicalName(key.name), fixed, data]),
    mac,
  };
}

/**
 * Verifies the TSIG record that must close the additional section of
 * `message`. Returns the MAC of the verified message, to be chained into the
 * next exchange, and throws `TSIGVerificationError` otherwise.
 */
export function verifyMessage(
  message: Buffer,
  key: TSIGKey,
  {requestMAC, now = currentTime()}: TSIGVerifyOptions = {},
): Buffer {
  const {unsigned, keyName, record} = splitSignedMessage(message);

  if (keyName.toLowerCase() !== trimName(key.name)) {
    throw new TSIGVerificationError(
      `Message is signed with unknown key "${keyName}".`,
    );
  }

  if (
    record.algorithm.toLowerCase() !==
    trimName(getTSIGAlgorithmName(key.algorithm))
  ) {
    throw new TSIGVerificationError(
      `Message is signed with unexpected algorithm "${record.algorithm}".`,
    );
  }

  if (record.error !== TSIGError.NOERROR) {
    throw new TSIGVerificationError(
      `Server rejected the signature (${getTSIGErrorName(record.error)}).`,
    );
  }

  const expected = computeMAC(unsigned, key, record, requestMAC);

  if (
    expected.length !== record.mac.length ||
    !timingSafeEqual(expected, record.mac)
  ) {
    throw new TSIGVerificationError('Signature does not verify.');
  }

  if (Math.abs(now - record.timeSigned) > record.fudge) {
    throw new TSIGVerificationError(
      `Signature time ${record.timeSigned} is outside the allowed window (now ${now}, fudge ${record.fudge}).`,
    );
  }

  return record.mac;
}

/**
 * Finds the TSIG record that must close the additional section of `message`
 * and rebuilds the message as it was before signing. Throws
 * `TSIGVerificationError` if the message is malformed or not signed.
 */
export function splitSignedMessage(message: Buffer): TSIGSplitMessage {
  let last: WireRecord | undefined;

  try {
    last = readLastRecord(message);
  } catch (error) {
    throw new TSIGVerificationError(
      `Malformed DNS message: ${getErrorMessage(error)}`,
    );
  }

  if (!last || message.readUInt16BE(10) === 0 || last.type !== TSIG_TYPE) {
    throw new TSIGVerificationError('Message is not signed.');
  }

  let record: TSIGRecord;

  try {
    record = decodeTSIGRecordData(last.data);
  } catch (error) {
    throw new TSIGVerificationError(
      `Malformed TSIG record: ${getErrorMessage(error)}`,
    );
  }

  const unsigned = Buffer.from(message.subarray(0, last.offset));

  unsigned.writeUInt16BE(record.originalId, 0);
  unsigned.writeUInt16BE(message.readUInt16BE(10) - 1, 10);

  return {unsigned, offset: last.offset, keyName: last.name, record};
}

export function encodeTSIGRecordData(record: TSIGRecord): Buffer {
  const timeAndFudge = Buffer.alloc(10);

  timeAndFudge.writeUIntBE(record.timeSigned, 0, 6);
  timeAndFudge.writeUInt16BE(record.fudge, 6);
  timeAndFudge.writeUInt16BE(record.mac.length, 8);

  const trailer = Buffer.alloc(6);

  trailer.writeUInt16BE(record.originalId, 0);
  trailer.writeUInt16BE(record.error, 2);
  trailer.writeUInt16BE(record.otherData.length, 4);

  return Buffer.concat([
    encodeCanonicalName(record.algorithm),
    timeAndFudge,
    record.mac,
    trailer,
    record.otherData,
  ]);
}

export function decodeTSIGRecordData(data: Buffer): TSIGRecord {
  const [algorithm, offset] = readName(data, 0);

  const macLength = data.readUInt16BE(offset + 8);
  const macOffset = offset + 10;
  const trailerOffset = macOffset + macLength;
  const otherLength = data.readUInt16BE(trailerOffset + 4);

  if (trailerOffset + 6 + otherLength > data.length) {
    throw new RangeError('TSIG record data runs past its length.');
  }

  return {
    algorithm,
    timeSigned: data.readUIntBE(offset, 6),
    fudge: data.readUInt16BE(offset + 6),
    mac: data.subarray(macOffset, trailerOffset),
    originalId: data.readUInt16BE(trailerOffset),
    error: data.readUInt16BE(trailerOffset + 2),
    otherData: data.subarray(trailerOffset + 6, trailerOffset + 6 + otherLength),
  };
}

function computeMAC(
  message: Buffer,
  key: TSIGKey,
  record: Omit<TSIGRecord, 'mac' | 'originalId'>,
  requestMAC: Buffer | undefined,
): Buffer {
  const hmac = createHmac(TSIG_ALGORITHMS[key.algorithm].hash, key.secret);

  if (requestMAC) {
    const requestMACLength = Buffer.alloc(2);

    requestMACLength.writeUInt16BE(requestMAC.length, 0);

    hmac.update(requestMACLength);
    hmac.update(requestMAC);
  }

  hmac.update(message);

  // TSIG variables (RFC 8945 section 4.3.3).
  const classAndTTL = Buffer.alloc(6);

  classAndTTL.writeUInt16BE(TSIG_CLASS, 0);
  classAndTTL.writeUInt32BE(0, 2);

  const timers = Buffer.alloc(8);

  timers.writeUIntBE(record.timeSigned, 0, 6);
  timers.writeUInt16BE(record.fudge, 6);

  const errorAndOther = Buffer.alloc(4);

  errorAndOther.writeUInt16BE(record.error, 0);
  errorAndOther.writeUInt16BE(record.otherData.length, 2);

  hmac.update(encodeCanonicalName(key.name));
  hmac.update(classAndTTL);
  hmac.update(encodeCanonicalName(record.algorithm));
  hmac.update(timers);
  hmac.update(errorAndOther);
  hmac.update(record.otherData);

  return hmac.digest();
}

type WireRecord = {
  offset: number;
  name: string;
  type: number;
  data: Buffer;
};

/**
 * Walks the sections of `message` and returns the last resource record, as
 * it is on the wire.
 */
function readLastRecord(message: Buffer): WireRecord | undefined {
  if (message.length < HEADER_LENGTH) {
    throw new RangeError(
      `DNS message too short (${message.length} bytes, header is ${HEADER_LENGTH}).`,
    );
  }

  let offset = HEADER_LENGTH;

  for (let index = message.readUInt16BE(4); index > 0; index--) {
    offset = readName(message, offset)[1] + 4;
  }

  const recordCount =
    message.readUInt16BE(6) + message.readUInt16BE(8) + message.readUInt16BE(10);

  let last: WireRecord | undefined;

  for (let index = 0; index < recordCount; index++) {
    const [name, next] = readName(message, offset);

    const dataOffset = next + 10;
    const end = dataOffset + message.readUInt16BE(next + 8);

    if (end > message.length) {
      throw new RangeError('Record data runs past the end of the message.');
    }

    last = {
      offset,
      name,
      type: message.readUInt16BE(next),
      data: message.subarray(dataOffset, end),
    };

    offset = end;
  }

  return last;
}

/**
 * Decodes a possibly compressed domain name starting at `offset`. Returns the
 * name (without trailing dot) and the offset right after it.
 */
function readName(buffer: Buffer, offset: number): [name: string, next: number] {
  const labels: string[] = [];

  let position = offset;
  let next: number | undefined;
  let pointers = 0;

  while (true) {
    if (position >= buffer.length) {
      throw new RangeError('Domain name runs past the end of the message.');
    }

    const length = buffer[position];

    if (length === 0) {
      position++;
      break;
    }

    if ((length & 0xc0) === 0xc0) {
      if (position + 1 >= buffer.length) {
        throw new RangeError('Truncated compression pointer.');
      }

      if (++pointers > NAME_POINTERS_MAX) {
        throw new RangeError('Too many compression pointers.');
      }

      next ??= position + 2;
      position = ((length & 0x3f) << 8) | buffer[position + 1];
      continue;
    }

    const end = position + 1 + length;

    if (end > buffer.length) {
      throw new RangeError('Label runs past the end of the message.');
    }

    labels.push(buffer.toString('ascii', position + 1, end));
    position = end;
  }

  return [labels.join('.'), next ?? position];
}

/**
 * Lowercase wire form of a name without compression, as TSIG digests it.
 */
function encodeCanonicalName(name: string): Buffer {
  const trimmed = trimTrailingDot(name).toLowerCase();

  const parts: Buffer[] = [];

  if (trimmed !== '') {
    for (const label of trimmed.split('.')) {
      const bytes = Buffer.from(label, 'ascii');

      parts.push(Buffer.from([bytes.length]), bytes);
    }
  }

  parts.push(Buffer.from([0]));

  return Buffer.concat(parts);
}

function getTSIGErrorName(error: number): string {
  for (const [name, value] of Object.entries(TSIGError)) {
    if (value === error) {
      return name;
    }
  }

  return `error ${error}`;
}

function trimName(name: string): string {
  return trimTrailingDot(name).toLowerCase();
}

function currentTime(): number {
  return Math.floor(Date.now() / 1000);
}
