import {Block} from "@ethereumjs/block";
import {Blockchain} from "@ethereumjs/blockchain";
import {Common} from "@ethereumjs/common";
import {EVMErrorMessage as ERROR, ExecResult} from "@ethereumjs/evm";
import {DefaultStateManager} from "@ethereumjs/statemanager";
import {Account, Address, bigIntToBytes} from "@ethereumjs/util";
import {VM} from "@ethereumjs/vm";
import {ZERO_ADDRESS} from "../constants.js";
import type {VerifiedStateView} from "../proof_provider/verified_state_view.js";
import {CallRequest, ELAccessList, ExecutionResult, TrustedExecutionHead} from "../types.js";
import {bytesToHex, hexToBigInt, hexToBytes} from "./conversion.js";
import {isPresent} from "./validation.js";

export async function createVM({common, stateManager}: {common: Common; stateManager: DefaultStateManager}): Promise<VM> {
  const blockchain = await Blockchain.create({common, validateBlocks: false, validateConsensus: false});
  return VM.create({common, blockchain, stateManager});
}

/**
 * State manager that notes the accounts and storage slots read during execution which the view
 * had not loaded. Those reads returned empty values, so the call must run again once they are loaded.
 */
export class RecordingStateManager extends DefaultStateManager {
  private recording = false;
  private readonly missing = new Map<string, Set<string>>();

  constructor(private readonly view: VerifiedStateView) {
    super();
  }

  startRecording(): void {
    this.recording = true;
  }

  getMissingState(): ELAccessList[] {
    return Array.from(this.missing.entries(), ([address, storageKeys]) => ({address, storageKeys: [...storageKeys]}));
  }

  async getAccount(address: Address): Promise<Account | undefined> {
    if (this.recording) {
      this.noteAccess(address.toString());
    }
    return super.getAccount(address);
  }

  async getContractStorage(address: Address, key: Uint8Array): Promise<Uint8Array> {
    if (this.recording) {
      this.noteAccess(address.toString(), bytesToHex(key));
    }
    return super.getContractStorage(address, key);
  }

  private noteAccess(address: string, storageKey?: string): void {
    const accountLoaded = this.view.hasAccount(address);
    const slotLoaded = storageKey === undefined || this.view.hasStorage(address, storageKey);
    if (accountLoaded && slotLoaded) {
      return;
    }

    let keys = this.missing.get(address);
    if (!keys) {
      keys = new Set();
      this.missing.set(address, keys);
    }
    if (storageKey !== undefined && !slotLoaded) {
      keys.add(storageKey);
    }
  }
}

/**
 * Copy the verified state of the view into the state manager of a fresh VM
 */
export async function updateStateManagerWithView({
  stateManager,
  view,
}: {
  stateManager: DefaultStateManager;
  view: VerifiedStateView;
}): Promise<void> {
  await stateManager.checkpoint();
  for (const {address, account, code, storage} of view.getLoadedState()) {
    // Absent accounts stay absent, the EVM treats them as empty
    if (account.nonce === 0n && account.balance === 0n && code.length === 0 && storage.size === 0) {
      continue;
    }

    const vmAddress = Address.fromString(address);
    await stateManager.putAccount(vmAddress, Account.fromAccountData({nonce: account.nonce, balance: account.balance}));
    if (code.length > 0) {
      await stateManager.putContractCode(vmAddress, code);
    }
    for (const [key, value] of storage) {
      if (value !== 0n) {
        await stateManager.putContractStorage(vmAddress, hexToBytes(key), bigIntToBytes(value));
      }
    }
  }
  await stateManager.commit();
}

/**
 * Block environment of a call, taken from the execution payload header the light client verified
 */
export function getVMBlockFromExecutionHead(head: TrustedExecutionHead, common: Common): Block {
  const {execution} = head;
  const eip4844 = common.isActivatedEIP(4844);
  const eip4788 = common.isActivatedEIP(4788);

  return Block.fromBlockData(
    {
      header: {
        parentHash: execution.parentHash,
        coinbase: execution.feeRecipient,
        stateRoot: execution.stateRoot,
        transactionsTrie: execution.transactionsRoot,
        receiptTrie: execution.receiptsRoot,
        logsBloom: execution.logsBloom,
        difficulty: 0n,
        number: BigInt(execution.blockNumber),
        gasLimit: BigInt(execution.gasLimit),
        gasUsed: BigInt(execution.gasUsed),
        timestamp: BigInt(execution.timestamp),
        extraData: execution.extraData,
        // prevRandao takes the place of the mix hash after the merge
        mixHash: execution.prevRandao,
        baseFeePerGas: execution.baseFeePerGas,
        withdrawalsRoot: execution.withdrawalsRoot,
        blobGasUsed: eip4844 ? execution.blobGasUsed : undefined,
        excessBlobGas: eip4844 ? execution.excessBlobGas : undefined,
        parentBeaconBlockRoot: eip4788 ? head.parentBeaconBlockRoot : undefined,
      },
    },
    {common, skipConsensusFormatValidation: true}
  );
}

export function getCallData(tx: CallRequest): Uint8Array {
  return hexToBytes(tx.input ?? tx.data ?? "0x");
}

export async function executeVMCall({vm, tx, block}: {vm: VM; tx: CallRequest; block: Block}): Promise<ExecutionResult> {
  const {from, to, gas, gasPrice, maxFeePerGas, value} = tx;

  const {execResult} = await vm.evm.runCall({
    // If tx does not have a from address then it must be initiated via zero address
    caller: Address.fromString(from ?? ZERO_ADDRESS),
    to: isPresent(to) ? Address.fromString(to) : undefined,
    // If no gas limit is specified use the block gas limit as an upper bound
    gasLimit: gas !== undefined ? hexToBigInt(gas) : block.header.gasLimit,
    gasPrice: hexToBigInt(gasPrice ?? maxFeePerGas ?? "0x0"),
    value: hexToBigInt(value ?? "0x0"),
    data: getCallData(tx),
    block,
  });

  return getExecutionResult(execResult);
}

export function getExecutionResult(execResult: ExecResult): ExecutionResult {
  const returnData = bytesToHex(execResult.returnValue);
  const gasUsed = execResult.executionGasUsed;
  const error = execResult.exceptionError?.error;

  switch (error) {
    case undefined:
      return {status: "success", returnData, gasUsed};
    case ERROR.REVERT:
      return {status: "revert", returnData, gasUsed, error};
    case ERROR.OUT_OF_GAS:
      return {status: "outOfGas", returnData, gasUsed, error};
    default:
      return {status: "halt", returnData, gasUsed, error};
  }
}
