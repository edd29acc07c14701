import {describe, it, expect} from "vitest";
import {ForkName} from "@vouch/params";
import {ssz, sszTypesFor} from "../../src/index.js";

describe("light-client ssz types", () => {
  it("should hash a deneb shaped header with the capella type as the capella value", () => {
    const header = ssz.deneb.ExecutionPayloadHeader.defaultValue();
    header.blockNumber = 17;
    const capellaValue = ssz.capella.ExecutionPayloadHeader.defaultValue();
    capellaValue.blockNumber = 17;

    expect(sszTypesFor(ForkName.capella).ExecutionPayloadHeader.hashTreeRoot(header)).toEqual(
      ssz.capella.ExecutionPayloadHeader.hashTreeRoot(capellaValue)
    );
  });

  it("should give deneb and capella different execution header roots", () => {
    const header = ssz.deneb.ExecutionPayloadHeader.defaultValue();
    expect(sszTypesFor(ForkName.deneb).ExecutionPayloadHeader.hashTreeRoot(header)).not.toEqual(
      sszTypesFor(ForkName.capella).ExecutionPayloadHeader.hashTreeRoot(header)
    );
  });

  it("should lengthen state branches at electra", () => {
    expect(ssz.deneb.LightClientUpdate.defaultValue().finalityBranch).toHaveLength(6);
    expect(ssz.electra.LightClientUpdate.defaultValue().finalityBranch).toHaveLength(7);
    expect(ssz.electra.LightClientBootstrap.defaultValue().currentSyncCommitteeBranch).toHaveLength(6);
  });

  it("should round trip a header through its json form", () => {
    const header = ssz.deneb.LightClientHeader.defaultValue();
    header.beacon.slot = 1234;
    header.execution.baseFeePerGas = BigInt(7);
    const json = ssz.deneb.LightClientHeader.toJson(header);

    expect(ssz.deneb.LightClientHeader.fromJson(json)).toEqual(header);
  });
});
