import { decodeAbiParameters, encodeAbiParameters, isAddressEqual, type Address, type Hex } from 'viem';
import { ErrorCode } from '../errors/codes.js';
import { LatchkeyError } from '../errors/LatchkeyError.js';
import { ZERO_ADDRESS, type ModuleTypeId } from '../types/account.js';

/** A module plus the data handed to its `onInstall` */
export interface ModuleInit {
  module: Address;
  initData: Hex;
}

/** A pre-validation hook install; the type picks the surface */
export interface PreValidationHookInit extends ModuleInit {
  moduleTypeId: ModuleTypeId;
}

/**
 * Modules installed by `initializeAccount`, in this order: validators,
 * executors, hook, fallbacks, pre-validation hooks.
 */
export interface BootstrapConfig {
  validators: ModuleInit[];
  executors: ModuleInit[];
  hook?: ModuleInit | undefined;
  /** `initData` uses the fallback layout: `selector(4) ‖ callType(1) ‖ moduleInitData` */
  fallbacks: ModuleInit[];
  preValidationHooks: PreValidationHookInit[];
}

const moduleInitComponents = [
  { name: 'module', type: 'address' },
  { name: 'initData', type: 'bytes' },
] as const;

const BOOTSTRAP_PARAMS = [
  {
    name: 'config',
    type: 'tuple',
    components: [
      { name: 'validators', type: 'tuple[]', components: moduleInitComponents },
      { name: 'executors', type: 'tuple[]', components: moduleInitComponents },
      { name: 'hook', type: 'tuple', components: moduleInitComponents },
      { name: 'fallbacks', type: 'tuple[]', components: moduleInitComponents },
      {
        name: 'preValidationHooks',
        type: 'tuple[]',
        components: [{ name: 'moduleTypeId', type: 'uint256' }, ...moduleInitComponents],
      },
    ],
  },
] as const;

/** An empty bootstrap: the account installs nothing and just becomes initialized */
export function emptyBootstrapConfig(): BootstrapConfig {
  return { validators: [], executors: [], fallbacks: [], preValidationHooks: [] };
}

/**
 * ABI-encode a bootstrap config for `initializeAccount(bytes)`. An absent hook
 * is encoded as the zero address.
 */
export function encodeBootstrapConfig(config: BootstrapConfig): Hex {
  return encodeAbiParameters(BOOTSTRAP_PARAMS, [
    {
      validators: config.validators,
      executors: config.executors,
      hook: config.hook ?? { module: ZERO_ADDRESS, initData: '0x' },
      fallbacks: config.fallbacks,
      preValidationHooks: config.preValidationHooks,
    },
  ]);
}

function decodeRaw(data: Hex) {
  try {
    return decodeAbiParameters(BOOTSTRAP_PARAMS, data)[0];
  } catch (err) {
    throw new LatchkeyError(ErrorCode.INVALID_INIT_DATA, 'Malformed bootstrap config', { cause: err });
  }
}

export function decodeBootstrapConfig(data: Hex): BootstrapConfig {
  const decoded = decodeRaw(data);

  const copy = (entry: { module: Address; initData: Hex }): ModuleInit => ({
    module: entry.module,
    initData: entry.initData,
  });
  return {
    validators: decoded.validators.map(copy),
    executors: decoded.executors.map(copy),
    hook: isAddressEqual(decoded.hook.module, ZERO_ADDRESS) ? undefined : copy(decoded.hook),
    fallbacks: decoded.fallbacks.map(copy),
    preValidationHooks: decoded.preValidationHooks.map((entry) => ({
      moduleTypeId: entry.moduleTypeId,
      ...copy(entry),
    })),
  };
}
