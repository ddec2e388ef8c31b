import { recoverAddress, recoverMessageAddress, type Address, type Hex } from 'viem';

/**
 * Signer of an EIP-191 signed message over the raw bytes of `hash`, or
 * `undefined` when the signature cannot be recovered.
 */
export async function tryRecoverMessageSigner(hash: Hex, signature: Hex): Promise<Address | undefined> {
  try {
    return await recoverMessageAddress({ message: { raw: hash }, signature });
  } catch {
    // malformed signature: treated as "no signer"
    return undefined;
  }
}

/**
 * Signer of `hash` signed directly (no message prefix), or `undefined` when
 * the signature cannot be recovered.
 */
export async function tryRecoverHashSigner(hash: Hex, signature: Hex): Promise<Address | undefined> {
  try {
    return await recoverAddress({ hash, signature });
  } catch {
    // malformed signature: treated as "no signer"
    return undefined;
  }
}
