import type {Emitter} from "mitt";
import {LightClientHeader} from "@vouch/types";
import {RunStatusCode} from "./types.js";

export enum LightclientEvent {
  optimisticHeader = "light_client_optimistic_header",
  finalizedHeader = "light_client_finalized_header",
  statusChange = "light_client_status_change",
}

export type LightclientEmitterEvents = {
  [LightclientEvent.optimisticHeader]: LightClientHeader;
  [LightclientEvent.finalizedHeader]: LightClientHeader;
  [LightclientEvent.statusChange]: RunStatusCode;
};

export type LightclientEmitter = Emitter<LightclientEmitterEvents>;
