import { randomInt } from "node:crypto";
import { v4 as uuidv4 } from "uuid";

export const DEFAULT_CALLER_ID = "default_user";

const ALPHANUMERIC =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export interface IdGenerator {
  // Uniform integer in [0, max).
  randomInt(max: number): number;
  uuid(): string;
  now(): Date;
}

export const cryptoIdGenerator: IdGenerator = {
  randomInt: (max) => (max > 1 ? randomInt(max) : 0),
  uuid: () => uuidv4(),
  now: () => new Date(),
};

export interface Identity {
  callerId: string;
  conversationId: string;
}

export class IdentityRotator {
  private index: number;

  constructor(
    private readonly callerIds: readonly string[],
    private readonly ids: IdGenerator = cryptoIdGenerator,
    private readonly fallbackCallerId: string = DEFAULT_CALLER_ID,
  ) {
    this.index = callerIds.length > 0 ? ids.randomInt(callerIds.length) : 0;
  }

  next(): Identity {
    return {
      callerId: this.nextCallerId(),
      conversationId: `${Math.floor(this.ids.now().getTime() / 1000)}-${this.ids.uuid()}`,
    };
  }

  private nextCallerId(): string {
    if (this.callerIds.length === 0) {
      return this.fallbackCallerId;
    }
    this.index = (this.index + 1) % this.callerIds.length;
    return this.callerIds[this.index];
  }
}

export function randomString(length: number, ids: IdGenerator): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += ALPHANUMERIC[ids.randomInt(ALPHANUMERIC.length)];
  }
  return out;
}

function pad(n: number, width = 2) {
  return String(n).padStart(width, "0");
}

// chatcmpl-<yyyyMMddHHmmss><10 random characters>, UTC.
export function generateResponseId(
  ids: IdGenerator = cryptoIdGenerator,
): string {
  const d = ids.now();
  const stamp =
    pad(d.getUTCFullYear(), 4) +
    pad(d.getUTCMonth() + 1) +
    pad(d.getUTCDate()) +
    pad(d.getUTCHours()) +
    pad(d.getUTCMinutes()) +
    pad(d.getUTCSeconds());
  return `chatcmpl-${stamp}${randomString(10, ids)}`;
}
