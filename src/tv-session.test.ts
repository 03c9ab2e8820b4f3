import { TvConnectionError, TvRequestError } from "./errors.js";
import {
  closeSession,
  deleteArtwork,
  ensureArtMode,
  turnOff,
  type ArtSession,
  type EnsureArtModeState,
  type RemoteSession,
} from "./tv-session.js";
import { sendWakePackets } from "./wake-on-lan.js";

function fakeSession(artModeOn = true) {
  return {
    upload: jest.fn().mockResolvedValue("NEW_ID"),
    select: jest.fn().mockResolvedValue(undefined),
    delete: jest.fn().mockResolvedValue(undefined),
    getArtMode: jest.fn().mockResolvedValue(artModeOn),
    setArtMode: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined),
  } satisfies ArtSession;
}

const unreachable = () => new TvConnectionError("Cannot connect to ws://192.168.1.100:8001: ECONNREFUSED");

describe("tv-session", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("deleteArtwork", () => {
    it("deletes and reports true", async () => {
      const session = fakeSession();
      expect(await deleteArtwork(session, "OLD_ID")).toBe(true);
      expect(session.delete).toHaveBeenCalledWith("OLD_ID");
    });

    it("logs and reports false when the TV no longer has it", async () => {
      const session = fakeSession();
      session.delete.mockRejectedValue(new TvRequestError("delete_image_list", "error_code -1"));
      expect(await deleteArtwork(session, "GONE_ID")).toBe(false);
      expect(console.warn).toHaveBeenCalledWith(
        "[TV] Could not delete previous artwork GONE_ID:",
        "delete_image_list: error_code -1",
      );
    });
  });

  describe("turnOff", () => {
    it("holds the power key once for 3 seconds on port 8002", async () => {
      const remote = {
        holdKey: jest.fn().mockResolvedValue(undefined),
        close: jest.fn().mockResolvedValue(undefined),
      } satisfies RemoteSession;
      const connectRemote = jest.fn().mockResolvedValue(remote);

      await turnOff("192.168.1.100", { connectRemote });

      expect(connectRemote).toHaveBeenCalledTimes(1);
      expect(connectRemote).toHaveBeenCalledWith("192.168.1.100", 8002);
      expect(remote.holdKey).toHaveBeenCalledTimes(1);
      expect(remote.holdKey).toHaveBeenCalledWith("KEY_POWER", 3000);
      expect(remote.close).toHaveBeenCalledTimes(1);
    });

    it("closes the session when the key press fails", async () => {
      const remote = {
        holdKey: jest.fn().mockRejectedValue(new Error("socket hang up")),
        close: jest.fn().mockResolvedValue(undefined),
      } satisfies RemoteSession;
      await expect(turnOff("192.168.1.100", { connectRemote: async () => remote })).rejects.toThrow("socket hang up");
      expect(remote.close).toHaveBeenCalledTimes(1);
    });
  });

  describe("ensureArtMode", () => {
    it("sets art mode on when it is off", async () => {
      const session = fakeSession(false);
      const connect = jest.fn().mockResolvedValue(session);
      const states: EnsureArtModeState[] = [];

      await ensureArtMode({ ip: "192.168.1.100", connect, retryDelayMs: 10, onState: s => states.push(s) });

      expect(connect).toHaveBeenCalledWith("192.168.1.100", 8001);
      expect(session.setArtMode).toHaveBeenCalledWith(true);
      expect(session.close).toHaveBeenCalledTimes(1);
      expect(states).toEqual(["disconnected", "connected", "done"]);
    });

    it("leaves art mode alone when it is already on", async () => {
      const session = fakeSession(true);
      await ensureArtMode({ ip: "192.168.1.100", connect: async () => session, retryDelayMs: 10 });
      expect(session.setArtMode).not.toHaveBeenCalled();
    });

    it("fails without wake packets when no hardware address is known", async () => {
      const connect = jest.fn().mockRejectedValue(unreachable());
      const sendWake = jest.fn().mockResolvedValue(undefined);
      const sleep = jest.fn().mockResolvedValue(undefined);
      const states: EnsureArtModeState[] = [];

      await expect(ensureArtMode({
        ip: "192.168.1.100",
        connect,
        sendWake,
        sleep,
        retryDelayMs: 10,
        onState: s => states.push(s),
      })).rejects.toBeInstanceOf(TvConnectionError);

      expect(connect).toHaveBeenCalledTimes(1);
      expect(sendWake).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
      expect(states).toEqual(["disconnected", "failed"]);
    });

    it("wakes with 3 packets to .255, waits, and retries once", async () => {
      const session = fakeSession(false);
      const connect = jest.fn()
        .mockRejectedValueOnce(unreachable())
        .mockResolvedValueOnce(session);
      const send = jest.fn().mockResolvedValue(undefined);
      const sleep = jest.fn().mockResolvedValue(undefined);
      const states: EnsureArtModeState[] = [];

      await ensureArtMode({
        ip: "192.168.1.100",
        mac: "aa:bb:cc:dd:ee:ff",
        connect,
        sendWake: (mac, ip) => sendWakePackets({ mac, ip, send }),
        sleep,
        retryDelayMs: 15000,
        onState: s => states.push(s),
      });

      expect(send).toHaveBeenCalledTimes(3);
      expect(send.mock.calls.map(([, address]) => address)).toEqual(["192.168.1.255", "192.168.1.255", "192.168.1.255"]);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(15000);
      expect(connect).toHaveBeenCalledTimes(2);
      expect(session.setArtMode).toHaveBeenCalledWith(true);
      expect(states).toEqual(["disconnected", "wake-sent", "disconnected", "connected", "done"]);
    });

    it("gives up after the single retry", async () => {
      const connect = jest.fn().mockRejectedValue(unreachable());
      const send = jest.fn().mockResolvedValue(undefined);
      const sleep = jest.fn().mockResolvedValue(undefined);
      const states: EnsureArtModeState[] = [];

      await expect(ensureArtMode({
        ip: "192.168.1.100",
        mac: "aa:bb:cc:dd:ee:ff",
        connect,
        sendWake: (mac, ip) => sendWakePackets({ mac, ip, send }),
        sleep,
        retryDelayMs: 15000,
        onState: s => states.push(s),
      })).rejects.toBeInstanceOf(TvConnectionError);

      expect(connect).toHaveBeenCalledTimes(2);
      expect(send).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(states).toEqual(["disconnected", "wake-sent", "disconnected", "failed"]);
    });

    it("does not wake for errors other than connection failures", async () => {
      const connect = jest.fn().mockRejectedValue(new Error("bad certificate"));
      const sendWake = jest.fn().mockResolvedValue(undefined);

      await expect(ensureArtMode({
        ip: "192.168.1.100",
        mac: "aa:bb:cc:dd:ee:ff",
        connect,
        sendWake,
        sleep: async () => undefined,
        retryDelayMs: 10,
      })).rejects.toThrow("bad certificate");
      expect(sendWake).not.toHaveBeenCalled();
    });

    it("propagates a failure to set art mode and still closes the session", async () => {
      const session = fakeSession(false);
      session.setArtMode.mockRejectedValue(new TvRequestError("set_artmode_status", "no answer within 10ms"));

      await expect(ensureArtMode({ ip: "192.168.1.100", connect: async () => session, retryDelayMs: 10 }))
        .rejects.toThrow("set_artmode_status: no answer within 10ms");
      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it("reports the art-mode error, not a failing close", async () => {
      const session = fakeSession(false);
      session.setArtMode.mockRejectedValue(new TvRequestError("set_artmode_status", "error_code -7"));
      session.close.mockRejectedValue(new Error("socket already closed"));

      await expect(ensureArtMode({ ip: "192.168.1.100", connect: async () => session, retryDelayMs: 10 }))
        .rejects.toThrow("set_artmode_status: error_code -7");
      expect(console.warn).toHaveBeenCalledWith("[TV] Could not close the session:", "socket already closed");
    });
  });

  describe("closeSession", () => {
    it("logs a failed close instead of throwing", async () => {
      const session = { close: jest.fn().mockRejectedValue(new Error("EPIPE")) };
      await expect(closeSession(session)).resolves.toBeUndefined();
      expect(console.warn).toHaveBeenCalledWith("[TV] Could not close the session:", "EPIPE");
    });
  });
});
