// packages/triage/src/classifiers/weakCrypto.ts
import { firstMatch, hasToken } from './shared.js';
import { verdict, type FindingClassifier } from './types.js';

const WEAK: ReadonlyArray<[string, string]> = [
  ['md5', 'MD5 is cryptographically broken'],
  ['sha1', 'SHA-1 has practical collision attacks'],
  ['3des', 'Triple DES is deprecated'],
  ['des', 'DES keys are 56 bits'],
  ['rc2', 'RC2 is weak'],
  ['rc4', 'RC4 output is biased'],
  ['blowfish', 'Blowfish has a 64-bit block size'],
  ['ecb', 'ECB mode leaks plaintext structure'],
];

const SAFE = ['sha256', 'sha384', 'sha512', 'sha3', 'aes', 'chacha20', 'poly1305', 'argon2', 'bcrypt', 'scrypt', 'pbkdf2'];

const CHECKSUM_CONTEXT = ['checksum', 'file_hash', 'hash_file', 'filehash', 'etag', 'integrity', 'verify_file', 'compare_hash', 'cache_key', 'cachekey', 'usedforsecurity=false'];
const SECURITY_CONTEXT = ['password', 'passwd', 'credential', 'auth', 'secret', 'encrypt', 'token', 'session'];

function isComment(line: string): boolean {
  return /^\s*(#|\/\/|\*|\/\*)/.test(line);
}

/** Same non-comment line names the algorithm and a checksum use, and nothing security related. */
function isChecksumContext(code: string, algo: string): boolean {
  return code
    .split('\n')
    .filter((line) => !isComment(line) && hasToken(line, algo))
    .some((line) => firstMatch(line, CHECKSUM_CONTEXT) !== undefined && firstMatch(line, SECURITY_CONTEXT) === undefined);
}

export const weakCryptoClassifier: FindingClassifier = {
  id: 'weak-crypto',
  classify({ code }) {
    const lower = code.toLowerCase();

    for (const [algo, reason] of WEAK) {
      if (!hasToken(lower, algo)) continue;
      if ((algo === 'md5' || algo === 'sha1') && isChecksumContext(lower, algo)) {
        return verdict(this.id, 'false_positive', 0.75, `${algo.toUpperCase()} is used for a checksum, not for security.`);
      }
      if (firstMatch(lower, SECURITY_CONTEXT)) {
        return verdict(this.id, 'true_positive', 0.9, `Weak algorithm ${algo.toUpperCase()} in a security context. ${reason}.`);
      }
      return verdict(this.id, 'true_positive', 0.85, `Weak algorithm ${algo.toUpperCase()}. ${reason}.`);
    }

    const safe = SAFE.find((algo) => hasToken(lower, algo));
    if (safe) {
      return verdict(this.id, 'false_positive', 0.7, `Strong algorithm in use: ${safe}.`);
    }
    return verdict(this.id, 'needs_review', 0.5, 'Could not identify the algorithm in use.');
  },
};
