import * as dnsPacket from 'dns-packet';

import type {DDNSType} from '../address.js';

export const HEADER_LENGTH = 12;

export const Opcode = {
  QUERY: 0,
  UPDATE: 5,
} as const;

export const ResponseCode = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
  YXDOMAIN: 6,
  YXRRSET: 7,
  NXRRSET: 8,
  NOTAUTH: 9,
  NOTZONE: 10,
} as const;

export function getResponseCodeName(rcode: number): string {
  for (const [name, value] of Object.entries(ResponseCode)) {
    if (value === rcode) {
      return name;
    }
  }

  return `RCODE${rcode}`;
}

export type DNSQuestion = dnsPacket.Question;

export type DNSRecord = dnsPacket.Answer;

/**
 * Deletes every record of `recordType` at `name` (RFC 2136 section 2.5.2):
 * class ANY, TTL 0 and no RDATA, a shape dns-packet has no record codec for.
 */
export type DNSRRsetDeletion = {
  type: 'rrset-deletion';
  name: string;
  recordType: DDNSType;
};

/**
 * A DNS message. For UPDATE messages (RFC 2136) the four sections are the
 * zone, prerequisite, update and additional sections.
 */
export type DNSMessage = {
  id: number;
  response: boolean;
  opcode: number;
  authoritative: boolean;
  truncated: boolean;
  rcode: number;
  questions: DNSQuestion[];
  answers: DNSRecord[];
  authorities: (DNSRecord | DNSRRsetDeletion)[];
  additionals: DNSRecord[];
};

export type DNSMessageInit = Partial<DNSMessage> & {id: number};

export function createMessage(init: DNSMessageInit): DNSMessage {
  return {
    response: false,
    opcode: Opcode.QUERY,
    authoritative: false,
    truncated: false,
    rcode: ResponseCode.NOERROR,
    questions: [],
    answers: [],
    authorities: [],
    additionals: [],
    ...init,
  };
}

export function encodeMessage({
  id,
  response,
  opcode,
  authoritative,
  truncated,
  rcode,
  questions,
  answers,
  authorities,
  additionals,
}: DNSMessage): Buffer {
  const header = dnsPacket.encode({
    type: response ? 'response' : 'query',
    id,
    flags:
      ((opcode & 0xf) << 11) |
      (authoritative ? dnsPacket.AUTHORITATIVE_ANSWER : 0) |
      (truncated ? dnsPacket.TRUNCATED_RESPONSE : 0) |
      (rcode & 0xf),
    questions,
  });

  // Records are encoded one at a time so RRset deletions can sit among them.
  header.writeUInt16BE(answers.length, 6);
  header.writeUInt16BE(authorities.length, 8);
  header.writeUInt16BE(additionals.length, 10);

  return Buffer.concat([
    header,
    ...[...answers, ...authorities, ...additionals].map(encodeRecord),
  ]);
}

export function decodeMessage(buffer: Buffer): DNSMessage {
  const packet = dnsPacket.decode(buffer);

  const flags = packet.flags ?? 0;

  return {
    id: packet.id ?? 0,
    response: packet.type === 'response',
    opcode: (flags >> 11) & 0xf,
    authoritative: (flags & dnsPacket.AUTHORITATIVE_ANSWER) !== 0,
    truncated: (flags & dnsPacket.TRUNCATED_RESPONSE) !== 0,
    rcode: flags & 0xf,
    questions: packet.questions ?? [],
    answers: packet.answers ?? [],
    authorities: packet.authorities ?? [],
    additionals: packet.additionals ?? [],
  };
}

function encodeRecord(record: DNSRecord | DNSRRsetDeletion): Buffer {
  if (record.type === 'rrset-deletion') {
    const {name, recordType} = record;

    // Owner, type and class encode like a question, TTL and RDLENGTH stay 0.
    return Buffer.concat([
      dnsPacket
        .encode({
          type: 'query',
          id: 0,
          questions: [{name, type: recordType, class: 'ANY'}],
        })
        .subarray(HEADER_LENGTH),
      Buffer.alloc(6),
    ]);
  }

  return dnsPacket
    .encode({type: 'query', id: 0, answers: [record]})
    .subarray(HEADER_LENGTH);
}
