import crypto from 'crypto';
import type { Ciphertext, EncryptedArithmetic } from './groupLedger.js';

/**
 * Symbolic ciphertext handles for a coprocessor-backed encryption layer.
 * Each handle is the hash of the operation that produced it; the coprocessor
 * evaluates the actual ciphertexts when the oracle resolves a handle.
 */
export class HandleArithmetic implements EncryptedArithmetic {
    zero(): Ciphertext {
        return this.encryptConstant(0);
    }

    encryptConstant(value: number): Ciphertext {
        if (!Number.isSafeInteger(value) || value < 0) {
            throw new RangeError(`Constant must be a non-negative integer, got ${value}`);
        }
        return handle(`const:${value}`);
    }

    add(a: Ciphertext, b: Ciphertext): Ciphertext {
        return handle(`add:${a}:${b}`);
    }
}

function handle(expression: string): Ciphertext {
    return '0x' + crypto.createHash('sha256').update(expression).digest('hex');
}
