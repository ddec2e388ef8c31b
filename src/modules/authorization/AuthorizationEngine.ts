import {
  getAddress,
  isAddressEqual,
  numberToHex,
  size,
  slice,
  type Address,
  type Hex,
} from 'viem';
import type { AccountContext } from '../../core/context.js';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import {
  ERC1271_INVALID,
  ERC1271_MAGIC_VALUE,
  VALIDATION_FAILED,
  VALIDATION_SUCCESS,
  type UserOperation,
  type ValidationData,
} from '../../types/account.js';
import {
  isPreValidationHookERC1271,
  isPreValidationHookERC4337,
  isValidatorModule,
  type HookedAuthorization,
  type ValidatorModule,
} from '../../types/modules.js';
import { tail } from '../../utils/hex.js';
import type { ListCategory } from '../registry/types.js';
import { tryRecoverHashSigner, tryRecoverMessageSigner } from './signature.js';

const UINT160_MASK = (1n << 160n) - 1n;
const VALIDATOR_PREFIX_SIZE = 20;

/**
 * Validator address encoded in the high 160 bits of a user operation nonce.
 */
export function validatorFromNonce(nonce: bigint): Address {
  return getAddress(numberToHex((nonce >> 96n) & UINT160_MASK, { size: 20 }));
}

/**
 * Selects a validator for a request, runs the pre-validation hooks of the
 * matching surface, and returns the validator's verdict.
 *
 * While the account is bootstrapping (no validator installed, not yet
 * initialized) a request naming an unknown validator is checked against the
 * account's own key instead.
 */
export class AuthorizationEngine {
  private readonly ctx: AccountContext;

  constructor(ctx: AccountContext) {
    this.ctx = ctx;
  }

  /**
   * Transaction authorization.
   *
   * The prefund is paid before anything else, so it is owed even when
   * validation then reports a failure.
   *
   * @returns `0n`, `1n`, or the validator's packed validation data unmodified
   */
  async validateUserOp(
    userOp: UserOperation,
    userOpHash: Hex,
    missingAccountFunds: bigint,
  ): Promise<ValidationData> {
    await this.payPrefund(missingAccountFunds);

    const validator = validatorFromNonce(userOp.nonce);
    if (!this.ctx.state.registry.exists('validator', validator)) {
      if (!this.ctx.state.isBootstrapping()) return VALIDATION_FAILED;
      const signer = await tryRecoverMessageSigner(userOpHash, userOp.signature);
      return this.isSelf(signer) ? VALIDATION_SUCCESS : VALIDATION_FAILED;
    }

    let hooked: HookedAuthorization = { hash: userOpHash, signature: userOp.signature };
    for (const hookAddress of this.hooksFor('preValidationHookERC4337')) {
      const hook = this.ctx.host.getCode(hookAddress);
      if (!isPreValidationHookERC4337(hook)) throw invalidModule(hookAddress, 'pre-validation hook');
      hooked = await hook.preValidationHookERC4337(
        this.ctx.address,
        { ...userOp, signature: hooked.signature },
        missingAccountFunds,
        hooked.hash,
      );
    }

    return this.validatorCode(validator).validateUserOp(
      this.ctx.address,
      { ...userOp, signature: hooked.signature },
      hooked.hash,
    );
  }

  /**
   * Direct signature authorization (ERC-1271).
   *
   * The first 20 bytes of `signature` name the validator; the rest is handed
   * to it. Naming a validator that is not installed is an error once the
   * account has left bootstrap, unlike the transaction surface, which
   * answers with a failure value.
   *
   * @returns The validator's 4-byte answer, or the bootstrap magic/failure value
   */
  async isValidSignature(sender: Address, hash: Hex, signature: Hex): Promise<Hex> {
    if (size(signature) < VALIDATOR_PREFIX_SIZE) {
      throw new LatchkeyError(
        ErrorCode.INVALID_SIGNATURE,
        `Signature must start with a ${VALIDATOR_PREFIX_SIZE}-byte validator address`,
      );
    }
    const validator = getAddress(slice(signature, 0, VALIDATOR_PREFIX_SIZE));
    const material = tail(signature, VALIDATOR_PREFIX_SIZE);

    if (!this.ctx.state.registry.exists('validator', validator)) {
      if (!this.ctx.state.isBootstrapping()) {
        throw new LatchkeyError(ErrorCode.INVALID_MODULE, `Validator ${validator} is not installed`, {
          module: validator,
        });
      }
      const signer = await tryRecoverHashSigner(hash, material);
      return this.isSelf(signer) ? ERC1271_MAGIC_VALUE : ERC1271_INVALID;
    }

    let hooked: HookedAuthorization = { hash, signature: material };
    for (const hookAddress of this.hooksFor('preValidationHookERC1271')) {
      const hook = this.ctx.host.getCode(hookAddress);
      if (!isPreValidationHookERC1271(hook)) throw invalidModule(hookAddress, 'pre-validation hook');
      hooked = await hook.preValidationHookERC1271(this.ctx.address, sender, hooked.hash, hooked.signature);
    }

    return this.validatorCode(validator).isValidSignatureWithSender(
      this.ctx.address,
      sender,
      hooked.hash,
      hooked.signature,
    );
  }

  private async payPrefund(missingAccountFunds: bigint): Promise<void> {
    if (missingAccountFunds === 0n) return;
    // The entry point checks the deposit itself; a failed transfer surfaces there.
    await this.ctx.host.call(this.ctx.address, this.ctx.entryPoint, missingAccountFunds, '0x');
  }

  private hooksFor(category: ListCategory): readonly Address[] {
    return this.ctx.state.registry.list(category);
  }

  private validatorCode(validator: Address): ValidatorModule {
    const code = this.ctx.host.getCode(validator);
    if (!isValidatorModule(code)) throw invalidModule(validator, 'validator');
    return code;
  }

  private isSelf(signer: Address | undefined): boolean {
    return signer !== undefined && isAddressEqual(signer, this.ctx.address);
  }
}

function invalidModule(module: Address, role: string): LatchkeyError {
  return new LatchkeyError(ErrorCode.INVALID_MODULE, `Installed ${role} ${module} has no matching code`, {
    module,
  });
}
