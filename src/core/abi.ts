import { parseAbi, toFunctionSelector, type Hex } from 'viem';

/**
 * Externally callable surface of the account, as seen through the
 * execution host. Calls with any other selector go to fallback handlers.
 */
export const smartAccountAbi = parseAbi([
  'function execute(bytes32 mode, bytes executionCalldata) payable',
  'function executeFromExecutor(bytes32 mode, bytes executionCalldata) payable returns (bytes[] returnData)',
  'function installModule(uint256 moduleTypeId, address module, bytes initData) payable',
  'function uninstallModule(uint256 moduleTypeId, address module, bytes deInitData) payable',
  'function initializeAccount(bytes initData) payable',
  'function onRedelegation() payable',
  'function isModuleInstalled(uint256 moduleTypeId, address module, bytes additionalContext) view returns (bool)',
  'function supportsModule(uint256 moduleTypeId) view returns (bool)',
  'function supportsExecutionMode(bytes32 mode) view returns (bool)',
  'function accountId() view returns (string)',
  'function isValidSignature(bytes32 hash, bytes signature) view returns (bytes4)',
]);

/** Lower-case selectors of {@link smartAccountAbi} */
export const ACCOUNT_SELECTORS: ReadonlySet<Hex> = new Set(
  smartAccountAbi.map((item) => toFunctionSelector(item)),
);
