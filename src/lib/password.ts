import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

// Stored as scrypt$N$r$p$<salt hex>$<hash hex>
const COST = 16384;
const BLOCK_SIZE = 8;
const PARALLELIZATION = 1;
const KEY_LENGTH = 64;

function deriveKey(password: string, salt: Buffer, cost: number, blockSize: number, parallelization: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(
      password,
      salt,
      KEY_LENGTH,
      { N: cost, r: blockSize, p: parallelization },
      (error, derivedKey) => {
        if (error) reject(error);
        else resolve(derivedKey);
      }
    );
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16);
  const key = await deriveKey(password, salt, COST, BLOCK_SIZE, PARALLELIZATION);
  return ['scrypt', COST, BLOCK_SIZE, PARALLELIZATION, salt.toString('hex'), key.toString('hex')].join('$');
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, cost, blockSize, parallelization, saltHex, hashHex] = stored.split('$');
  if (scheme !== 'scrypt' || !cost || !blockSize || !parallelization || !saltHex || !hashHex) {
    return false;
  }

  const expected = Buffer.from(hashHex, 'hex');
  const actual = await deriveKey(
    password,
    Buffer.from(saltHex, 'hex'),
    parseInt(cost, 10),
    parseInt(blockSize, 10),
    parseInt(parallelization, 10)
  );

  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
