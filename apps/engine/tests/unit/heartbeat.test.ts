import { HeartbeatService } from "../../src/services/heartbeat.service";
import { sleep } from "../helpers/poll";

describe("HeartbeatService", () => {
  let touchHeartbeat: jest.Mock<Promise<void>, [string]>;
  let heartbeat: HeartbeatService;

  beforeEach(() => {
    touchHeartbeat = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
    heartbeat = new HeartbeatService({ touchHeartbeat }, 50); // 50ms interval
  });

  afterEach(() => {
    heartbeat.stopAll();
  });

  it("touches the workflow on every tick", async () => {
    heartbeat.start("wf-1");
    await sleep(130); // ~2 ticks

    expect(touchHeartbeat).toHaveBeenCalledWith("wf-1");
    expect(heartbeat.isTracking("wf-1")).toBe(true);

    heartbeat.stop("wf-1");
    expect(heartbeat.isTracking("wf-1")).toBe(false);
  });

  it("tracks concurrent workflows independently", async () => {
    heartbeat.start("wf-1");
    heartbeat.start("wf-2");
    await sleep(75);

    expect(touchHeartbeat).toHaveBeenCalledWith("wf-1");
    expect(touchHeartbeat).toHaveBeenCalledWith("wf-2");

    heartbeat.stop("wf-1");
    touchHeartbeat.mockClear();
    await sleep(75);

    expect(touchHeartbeat).not.toHaveBeenCalledWith("wf-1");
    expect(touchHeartbeat).toHaveBeenCalledWith("wf-2");
  });

  it("starting twice keeps a single timer", async () => {
    heartbeat.start("wf-1");
    heartbeat.start("wf-1");
    await sleep(75);

    expect(touchHeartbeat).toHaveBeenCalledTimes(1);
  });

  it("keeps ticking after a failed update", async () => {
    touchHeartbeat.mockRejectedValueOnce(new Error("db down"));
    heartbeat.start("wf-1");
    await sleep(130);

    expect(touchHeartbeat.mock.calls.length).toBeGreaterThanOrEqual(2);
  });

  it("stopAll stops everything", async () => {
    heartbeat.start("wf-1");
    heartbeat.start("wf-2");
    heartbeat.stopAll();

    await sleep(100);
    expect(touchHeartbeat).not.toHaveBeenCalled();
  });
});
