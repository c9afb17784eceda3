import { Inject, Injectable } from '@nestjs/common';
import { compare, hash } from 'bcryptjs';
import { randomUUID } from 'node:crypto';
import { APP_CONFIG, AuthConfig } from '../config/app-config';

const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

// bcrypt ignores everything past this many bytes of input.
export const PASSWORD_MAX_BYTES = 72;

export function fitsPasswordLimit(plaintext: string): boolean {
  return Buffer.byteLength(plaintext, 'utf8') <= PASSWORD_MAX_BYTES;
}

@Injectable()
export class PasswordHasherService {
  private decoyHash?: Promise<string>;

  constructor(@Inject(APP_CONFIG) private readonly config: { auth: Pick<AuthConfig, 'bcryptRounds'> }) {}

  /** Salted hash; a fresh salt is generated on every call. */
  async hash(plaintext: string): Promise<string> {
    if (!fitsPasswordLimit(plaintext)) {
      throw new Error(`Password exceeds ${PASSWORD_MAX_BYTES} bytes`);
    }
    return hash(plaintext, this.config.auth.bcryptRounds);
  }

  /** Fails closed: over-long input, malformed hashes and library errors verify as false. */
  async verify(plaintext: string, storedHash: string): Promise<boolean> {
    if (!fitsPasswordLimit(plaintext) || !BCRYPT_HASH_PATTERN.test(storedHash)) {
      return false;
    }

    try {
      return (await compare(plaintext, storedHash)) === true;
    } catch {
      return false;
    }
  }

  /**
   * Spends the same work as `verify` against a hash no password matches.
   * Used when there is no stored hash, so lookups of unknown accounts take as long as real ones.
   */
  async verifyAgainstDecoy(plaintext: string): Promise<false> {
    this.decoyHash ??= hash(randomUUID(), this.config.auth.bcryptRounds);
    await this.verify(plaintext, await this.decoyHash);
    return false;
  }
}
