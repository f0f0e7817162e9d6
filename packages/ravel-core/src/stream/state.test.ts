import { describe, it, expect } from "vitest";
import {
  ALL_STATES,
  State,
  canBeginOp,
  canBeginSend,
  carriesError,
  isClosed,
  isOpenForReceiving,
  isOpenForSending,
  isSendAcked,
  sendsClose,
} from "./state.ts";

function members(pred: (s: State) => boolean): State[] {
  return ALL_STATES.filter(pred);
}

describe("state predicates", () => {
  it("has fifteen distinct states", () => {
    expect(ALL_STATES).toHaveLength(15);
    expect(new Set(ALL_STATES).size).toBe(15);
  });

  it("isOpenForSending", () => {
    expect(members(isOpenForSending)).toEqual([
      State.Open,
      State.LocalCloseRequestedOk,
      State.LocalClosedOkDraining,
      State.RemoteClosedOk,
      State.RemoteClosedAndLocalCloseRequestedOk,
      State.RemoteClosedOkAndLocalClosedOkDraining,
    ]);
  });

  it("isOpenForReceiving", () => {
    expect(members(isOpenForReceiving)).toEqual([
      State.Open,
      State.LocalCloseRequestedOk,
      State.LocalClosedOkDraining,
      State.LocalClosedOkComplete,
    ]);
  });

  it("canBeginSend", () => {
    expect(members(canBeginSend)).toEqual([
      State.Open,
      State.RemoteClosedOk,
      State.RemoteClosedAndLocalCloseRequestedOk,
    ]);
  });

  it("canBeginOp is everything but Quiesced", () => {
    expect(members(canBeginOp)).toEqual(ALL_STATES.filter((s) => s !== State.Quiesced));
  });

  it("isClosed", () => {
    expect(members(isClosed)).toEqual([State.ClosingProtocol, State.Closed, State.Quiesced]);
  });

  it("sendsClose", () => {
    expect(members(sendsClose)).toEqual([
      State.LocalCloseRequestedOk,
      State.LocalCloseRequestedWithError,
      State.RemoteClosedAndLocalCloseRequestedOk,
      State.RemoteClosedAndLocalCloseRequestedWithError,
    ]);
  });

  it("isSendAcked adds the pending states to sendsClose", () => {
    expect(members(isSendAcked)).toEqual([
      State.LocalCloseRequestedOk,
      State.LocalCloseRequestedWithError,
      State.RemoteClosedAndLocalCloseRequestedOk,
      State.RemoteClosedAndLocalCloseRequestedWithError,
      State.PendingCloseOnSendAck,
      State.PendingLocalCloseRequestedWithErrorOnSendAck,
      State.PendingRemoteClosedAndLocalCloseRequestedWithError,
    ]);
  });

  it("carriesError", () => {
    expect(members(carriesError)).toEqual([
      State.LocalCloseRequestedWithError,
      State.RemoteClosedAndLocalCloseRequestedWithError,
      State.PendingLocalCloseRequestedWithErrorOnSendAck,
      State.PendingRemoteClosedAndLocalCloseRequestedWithError,
    ]);
  });

  it("never reports a closed state as open", () => {
    for (const s of ALL_STATES) {
      if (isClosed(s)) {
        expect(isOpenForSending(s), s).toBe(false);
        expect(isOpenForReceiving(s), s).toBe(false);
      }
    }
  });
});
