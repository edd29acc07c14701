import {describe, it, expect, beforeAll, beforeEach} from "vitest";
import {PointFormat} from "@chainsafe/bls/types";
import {ssz} from "@vouch/types";
import {
  BootstrapErrorCode,
  ConsensusErrorCode,
  initBls,
  LightClientStore,
  verifyLightClientMessage,
} from "../../src/index.js";
import {initializeLightClientStore, processLightClientUpdate, normalizeLightClientUpdate} from "../../src/spec/index.js";
import {
  SLOTS_PER_PERIOD,
  createBootstrap,
  createFinalityUpdate,
  createOptimisticUpdate,
  createUpdate,
  getInteropSyncCommittee,
  testConfig,
} from "../utils/utils.js";
import {expectThrowsVouchError} from "../utils/errors.js";

const BOOTSTRAP_SLOT = 100;
const CURRENT_SLOT = 3 * SLOTS_PER_PERIOD;

describe("light client bootstrap", () => {
  beforeAll(async () => {
    await initBls();
  });

  it("should anchor a store at the checkpoint header", () => {
    const {checkpointRoot, bootstrap} = createBootstrap(BOOTSTRAP_SLOT, getInteropSyncCommittee(0));
    const store = initializeLightClientStore(testConfig, checkpointRoot, bootstrap, BOOTSTRAP_SLOT + 10);

    expect(store.finalizedHeader.beacon.slot).toBe(BOOTSTRAP_SLOT);
    expect(store.optimisticHeader.beacon.slot).toBe(BOOTSTRAP_SLOT);
    expect(store.nextSyncCommittee).toBeNull();
    expect(store.currentSyncCommittee.aggregatePubkey.toBytes(PointFormat.compressed)).toEqual(
      getInteropSyncCommittee(0).syncCommittee.aggregatePubkey
    );
  });

  it("should reject a bootstrap for another block root", () => {
    const {bootstrap} = createBootstrap(BOOTSTRAP_SLOT, getInteropSyncCommittee(0));
    const otherRoot = new Uint8Array(32).fill(1);
    expectThrowsVouchError(
      () => initializeLightClientStore(testConfig, otherRoot, bootstrap, BOOTSTRAP_SLOT),
      BootstrapErrorCode.CHECKPOINT_MISMATCH
    );
  });

  it("should reject an execution header not proven by the body root", () => {
    const {checkpointRoot, bootstrap} = createBootstrap(BOOTSTRAP_SLOT, getInteropSyncCommittee(0));
    bootstrap.header.execution.blockNumber += 1;
    expectThrowsVouchError(
      () => initializeLightClientStore(testConfig, checkpointRoot, bootstrap, BOOTSTRAP_SLOT),
      BootstrapErrorCode.INVALID_HEADER
    );
  });

  it("should reject a committee not proven by the state root", () => {
    const {checkpointRoot, bootstrap} = createBootstrap(BOOTSTRAP_SLOT, getInteropSyncCommittee(0));
    bootstrap.currentSyncCommittee = getInteropSyncCommittee(1).syncCommittee;
    expectThrowsVouchError(
      () => initializeLightClientStore(testConfig, checkpointRoot, bootstrap, BOOTSTRAP_SLOT),
      BootstrapErrorCode.INVALID_COMMITTEE_PROOF
    );
  });

  it("should reject an old checkpoint only in strict mode", () => {
    const {checkpointRoot, bootstrap} = createBootstrap(BOOTSTRAP_SLOT, getInteropSyncCommittee(0));
    const opts = {maxCheckpointAgeSec: 120};
    // 11 slots of 12 seconds
    const currentSlot = BOOTSTRAP_SLOT + 11;

    expect(initializeLightClientStore(testConfig, checkpointRoot, bootstrap, currentSlot, opts)).toBeInstanceOf(
      LightClientStore
    );

    expectThrowsVouchError(
      () => initializeLightClientStore(testConfig, checkpointRoot, bootstrap, currentSlot, {...opts, strictCheckpointAge: true}),
      {code: BootstrapErrorCode.CHECKPOINT_TOO_OLD, slot: BOOTSTRAP_SLOT, ageSec: 132, maxAgeSec: 120}
    );
  });
});

describe("light client update processing", () => {
  const committee0 = (): ReturnType<typeof getInteropSyncCommittee> => getInteropSyncCommittee(0);
  const committee1 = (): ReturnType<typeof getInteropSyncCommittee> => getInteropSyncCommittee(1);
  const committee2 = (): ReturnType<typeof getInteropSyncCommittee> => getInteropSyncCommittee(2);

  let store: LightClientStore;

  beforeAll(async () => {
    await initBls();
  });

  beforeEach(() => {
    const {checkpointRoot, bootstrap} = createBootstrap(BOOTSTRAP_SLOT, committee0());
    store = initializeLightClientStore(testConfig, checkpointRoot, bootstrap, BOOTSTRAP_SLOT);
  });

  function applyUpdate(update: ReturnType<typeof createUpdate>): ReturnType<typeof processLightClientUpdate> {
    return processLightClientUpdate(testConfig, store, CURRENT_SLOT, normalizeLightClientUpdate(update));
  }

  const learnNextCommitteeUpdate = (): ReturnType<typeof createUpdate> =>
    createUpdate({signer: committee0(), attestedSlot: 200, finalizedSlot: 150, nextCommittee: committee1()});

  it("should learn the next committee and advance both heads", () => {
    const result = applyUpdate(learnNextCommitteeUpdate());

    expect(result).toEqual({
      optimisticHeaderUpdated: true,
      finalizedHeaderUpdated: true,
      nextSyncCommitteeLearned: true,
      syncCommitteeRotated: false,
    });
    expect(store.finalizedHeader.beacon.slot).toBe(150);
    expect(store.optimisticHeader.beacon.slot).toBe(200);
    expect(store.nextSyncCommittee?.aggregatePubkey.toBytes(PointFormat.compressed)).toEqual(
      committee1().syncCommittee.aggregatePubkey
    );
    expect(store.currentMaxActiveParticipants).toBe(512);
  });

  it("should ignore an update applied twice", () => {
    const update = learnNextCommitteeUpdate();
    applyUpdate(update);
    const stateBefore = JSON.stringify(store.toJson());

    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.NOT_RELEVANT);
    expect(JSON.stringify(store.toJson())).toBe(stateBefore);
  });

  it("should ignore an update older than the store heads", () => {
    applyUpdate(learnNextCommitteeUpdate());
    const storeBefore = store.toJson();

    const olderUpdate = createUpdate({
      signer: committee0(),
      attestedSlot: 180,
      finalizedSlot: 120,
      nextCommittee: committee1(),
    });

    expectThrowsVouchError(() => applyUpdate(olderUpdate), ConsensusErrorCode.NOT_RELEVANT);
    expect(store.toJson()).toEqual(storeBefore);
  });

  it("should rotate committees when finality crosses into the next period", () => {
    applyUpdate(learnNextCommitteeUpdate());

    const result = applyUpdate(
      createUpdate({
        signer: committee1(),
        attestedSlot: SLOTS_PER_PERIOD + 10,
        finalizedSlot: SLOTS_PER_PERIOD + 5,
        nextCommittee: committee2(),
      })
    );

    expect(result.syncCommitteeRotated).toBe(true);
    expect(store.finalizedHeader.beacon.slot).toBe(SLOTS_PER_PERIOD + 5);
    expect(store.optimisticHeader.beacon.slot).toBe(SLOTS_PER_PERIOD + 10);
    expect(store.currentSyncCommittee.aggregatePubkey.toBytes(PointFormat.compressed)).toEqual(
      committee1().syncCommittee.aggregatePubkey
    );
    expect(store.nextSyncCommittee?.aggregatePubkey.toBytes(PointFormat.compressed)).toEqual(
      committee2().syncCommittee.aggregatePubkey
    );
    expect(store.previousMaxActiveParticipants).toBe(512);
    expect(store.currentMaxActiveParticipants).toBe(512);
  });

  it("should reject a signature from the period after next", () => {
    const update = createUpdate({signer: committee2(), attestedSlot: 2 * SLOTS_PER_PERIOD + 1});
    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.NO_COMMITTEE);
  });

  it("should reject less than two thirds participation and keep the store", () => {
    const stateBefore = JSON.stringify(store.toJson());
    // 341 * 3 < 512 * 2
    const update = createUpdate({signer: committee0(), attestedSlot: 200, participants: 341});

    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.INSUFFICIENT_PARTICIPATION);
    expect(JSON.stringify(store.toJson())).toBe(stateBefore);
  });

  it("should accept participation at the two thirds boundary", () => {
    const result = applyUpdate(createUpdate({signer: committee0(), attestedSlot: 200, participants: 342}));
    expect(result.optimisticHeaderUpdated).toBe(true);
    expect(store.currentMaxActiveParticipants).toBe(342);
  });

  it("should reject a signature from another committee", () => {
    const update = createUpdate({signer: getInteropSyncCommittee(5), attestedSlot: 200});
    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.INVALID_SIGNATURE);
  });

  it("should reject a signature slot in the future", () => {
    const update = createUpdate({signer: committee0(), attestedSlot: 200, signatureSlot: CURRENT_SLOT + 1});
    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.INVALID_TIMING);
  });

  it("should reject a signature slot not after the attested slot", () => {
    const update = createUpdate({signer: committee0(), attestedSlot: 200, signatureSlot: 200});
    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.INVALID_TIMING);
  });

  it("should reject a next committee not proven by the attested state", () => {
    const update = createUpdate({signer: committee0(), attestedSlot: 200, nextCommittee: committee1()});
    update.nextSyncCommittee = committee2().syncCommittee;
    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.INVALID_COMMITTEE_PROOF);
    expect(store.nextSyncCommittee).toBeNull();
  });

  it("should reject a finalized header not proven by the attested state", () => {
    const update = createUpdate({signer: committee0(), attestedSlot: 200, finalizedSlot: 150});
    update.finalizedHeader.beacon.slot = 160;
    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.INVALID_FINALITY_PROOF);
    expect(store.finalizedHeader.beacon.slot).toBe(BOOTSTRAP_SLOT);
  });

  it("should reject an attested header with a bad execution branch", () => {
    const update = createUpdate({signer: committee0(), attestedSlot: 200});
    update.attestedHeader.executionBranch = update.attestedHeader.executionBranch.map(() => new Uint8Array(32));
    expectThrowsVouchError(() => applyUpdate(update), ConsensusErrorCode.INVALID_HEADER);
  });

  it("should round trip the store through JSON", () => {
    applyUpdate(learnNextCommitteeUpdate());
    const json = store.toJson();
    const restored = LightClientStore.fromJson(JSON.parse(JSON.stringify(json)));

    expect(restored.toJson()).toEqual(json);
    expect(restored.optimisticHeader.beacon.slot).toBe(200);
    expect(restored.headers.size).toBe(2);
  });
});

describe("verifyLightClientMessage", () => {
  beforeAll(async () => {
    await initBls();
  });

  it("should create a store from a bootstrap message", () => {
    const {checkpointRoot, bootstrap} = createBootstrap(BOOTSTRAP_SLOT, getInteropSyncCommittee(0));
    const res = verifyLightClientMessage(testConfig, null, BOOTSTRAP_SLOT, {kind: "bootstrap", checkpointRoot, bootstrap});

    expect(res.kind).toBe("bootstrap");
    expect(res.store.finalizedHeader.beacon.slot).toBe(BOOTSTRAP_SLOT);
  });

  it("should reject an update without a store", () => {
    const update = createUpdate({signer: getInteropSyncCommittee(0), attestedSlot: 200});
    expectThrowsVouchError(
      () => verifyLightClientMessage(testConfig, null, CURRENT_SLOT, {kind: "update", update}),
      ConsensusErrorCode.NOT_BOOTSTRAPPED
    );
  });

  it("should apply finality and optimistic updates", () => {
    const {checkpointRoot, bootstrap} = createBootstrap(BOOTSTRAP_SLOT, getInteropSyncCommittee(0));
    const {store} = verifyLightClientMessage(testConfig, null, BOOTSTRAP_SLOT, {
      kind: "bootstrap",
      checkpointRoot,
      bootstrap,
    });

    const finalityUpdate = createFinalityUpdate({signer: getInteropSyncCommittee(0), attestedSlot: 300, finalizedSlot: 250});
    const finalityRes = verifyLightClientMessage(testConfig, store, CURRENT_SLOT, {
      kind: "finalityUpdate",
      update: finalityUpdate,
    });
    expect(finalityRes.kind).toBe("finalityUpdate");
    expect(store.finalizedHeader.beacon.slot).toBe(250);

    const optimisticUpdate = createOptimisticUpdate({signer: getInteropSyncCommittee(0), attestedSlot: 320});
    verifyLightClientMessage(testConfig, store, CURRENT_SLOT, {kind: "optimisticUpdate", update: optimisticUpdate});
    expect(store.optimisticHeader.beacon.slot).toBe(320);
    expect(ssz.phase0.BeaconBlockHeader.equals(store.optimisticHeader.beacon, optimisticUpdate.attestedHeader.beacon)).toBe(
      true
    );
  });
});
