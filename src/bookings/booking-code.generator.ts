import { Injectable } from '@nestjs/common';
import { randomInt } from 'node:crypto';

// No 0/O or 1/I/L, so codes survive being read aloud.
const SUFFIX_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';
const SUFFIX_LENGTH = 4;
const COUNTER_SPAN = 36 * 36;

/**
 * Human-readable booking codes: BK + base-36 timestamp + base-36 counter +
 * random suffix. Uniqueness is enforced by the bookings table; a collision
 * there is retried with a fresh code.
 */
@Injectable()
export class BookingCodeGenerator {
  private counter = randomInt(COUNTER_SPAN);

  next(now = Date.now()): string {
    this.counter = (this.counter + 1) % COUNTER_SPAN;

    const timestamp = now.toString(36).toUpperCase();
    const sequence = this.counter.toString(36).toUpperCase().padStart(2, '0');
    let suffix = '';
    for (let i = 0; i < SUFFIX_LENGTH; i++) {
      suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
    }

    return `BK${timestamp}${sequence}${suffix}`;
  }
}
