import { randomUUID } from "crypto";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it, vi } from "vitest";
import { ConfigStore, createDefaultConfig } from "../config.js";
import { SendError, ValidationError } from "../errors.js";
import { IntervalScheduler } from "../scheduling/interval-scheduler.js";
import type { ArmTimer } from "../scheduling/timer.js";
import type { PhotoSender } from "../types.js";
import { PostCoordinator } from "./post-coordinator.js";

const T0 = Date.UTC(2026, 0, 1, 12, 0, 0);
const T0_SEC = T0 / 1000;
const HOUR = 3_600;
const DAY = 86_400;

/** Store backed by a path that never exists; writes go through `writer`. */
async function createStore(
  options: {
    channelName?: string;
    picturePath?: string;
    postInterval?: number;
    lastPostTime?: number | null;
    writer?: (path: string, data: string) => Promise<void>;
  } = {},
) {
  const store = new ConfigStore(
    join(tmpdir(), `poster-missing-${randomUUID()}`, "config.json"),
    {
      defaults: () =>
        createDefaultConfig({
          botToken: "test-token",
          adminId: 42,
          postInterval: "1d",
        }),
      writeFile: (path, data) =>
        options.writer ? options.writer(path, data) : Promise.resolve(),
    },
  );
  await store.load();
  const result = await store.update((c) => ({
    ...c,
    channelName: options.channelName ?? c.channelName,
    picturePath: options.picturePath ?? c.picturePath,
    postInterval: options.postInterval ?? c.postInterval,
    lastPostTime:
      options.lastPostTime === undefined ? c.lastPostTime : options.lastPostTime,
  }));
  expect(result.ok).toBe(true);
  return store;
}

function okSender() {
  return { sendPhoto: vi.fn(async () => undefined) } satisfies PhotoSender;
}

function failingSender(message: string) {
  return {
    sendPhoto: vi.fn(async (): Promise<void> => {
      throw new Error(message);
    }),
  } satisfies PhotoSender;
}

const ready = { channelName: "@pics", picturePath: "/pics/picture.jpg" };
const readable = async () => true;

describe("PostCoordinator", () => {
  it("sends the picture and records the post time", async () => {
    const store = await createStore(ready);
    const sender = okSender();
    const scheduler = { notifyPosted: vi.fn() };
    const coordinator = new PostCoordinator({
      store,
      scheduler,
      sender,
      now: () => T0,
      isReadable: readable,
    });

    const result = await coordinator.postNow("manual");

    expect(result).toEqual({ ok: true, status: "posted", postedAt: T0_SEC });
    expect(sender.sendPhoto).toHaveBeenCalledWith("@pics", "/pics/picture.jpg");
    expect(store.current().lastPostTime).toBe(T0_SEC);
    expect(scheduler.notifyPosted).toHaveBeenCalledWith(T0_SEC);
  });

  it("re-anchors the schedule on a manual post", async () => {
    const store = await createStore({ ...ready, lastPostTime: T0_SEC - HOUR });
    const armTimer: ArmTimer = () => ({ cancel: () => undefined });
    const scheduler = new IntervalScheduler({ armTimer, now: () => T0 });
    const coordinator = new PostCoordinator({
      store,
      scheduler,
      sender: okSender(),
      now: () => T0,
      isReadable: readable,
    });
    scheduler.initialize(store.current(), () => coordinator.runScheduled());
    expect(scheduler.nextDueAt).toBe((T0_SEC - HOUR + DAY) * 1000);

    await coordinator.postNow("manual");

    expect(scheduler.nextDueAt).toBe((T0_SEC + DAY) * 1000);
  });

  it("reports a send failure and leaves lastPostTime alone", async () => {
    const store = await createStore(ready);
    const scheduler = { notifyPosted: vi.fn() };
    const coordinator = new PostCoordinator({
      store,
      scheduler,
      sender: failingSender("network down"),
      now: () => T0,
      isReadable: readable,
    });

    const result = await coordinator.postNow("manual");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SendError);
    expect(result.error.message).toBe("Error posting picture: network down");
    expect(store.current().lastPostTime).toBeNull();
    expect(scheduler.notifyPosted).not.toHaveBeenCalled();
  });

  it("refuses to post without a channel", async () => {
    const store = await createStore({ picturePath: "/pics/picture.jpg" });
    const sender = okSender();
    const coordinator = new PostCoordinator({
      store,
      scheduler: { notifyPosted: vi.fn() },
      sender,
      isReadable: readable,
    });

    const result = await coordinator.postNow("manual");

    expect(result).toEqual({
      ok: false,
      error: new ValidationError(
        "Channel is not set. Use /setchannel @channel_name.",
      ),
    });
    expect(sender.sendPhoto).not.toHaveBeenCalled();
  });

  it("refuses to post a picture that is not on disk", async () => {
    const store = await createStore(ready);
    const sender = okSender();
    const coordinator = new PostCoordinator({
      store,
      scheduler: { notifyPosted: vi.fn() },
      sender,
      isReadable: async () => false,
    });

    const result = await coordinator.postNow("manual");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe(
      "Picture not found: /pics/picture.jpg\nPlease set a valid picture using /setpicture.",
    );
    expect(sender.sendPhoto).not.toHaveBeenCalled();
  });

  it("skips a scheduled post when one already went out this cycle", async () => {
    const store = await createStore({ ...ready, lastPostTime: T0_SEC - HOUR });
    const sender = okSender();
    const coordinator = new PostCoordinator({
      store,
      scheduler: { notifyPosted: vi.fn() },
      sender,
      now: () => T0,
      isReadable: readable,
    });

    expect(await coordinator.postNow("scheduled")).toEqual({
      ok: true,
      status: "skipped",
    });
    expect(await coordinator.runScheduled()).toEqual({ ok: true });
    expect(sender.sendPhoto).not.toHaveBeenCalled();

    const manual = await coordinator.postNow("manual");
    expect(manual.ok && manual.status).toBe("posted");
    expect(sender.sendPhoto).toHaveBeenCalledTimes(1);
  });

  it("marks send failures retryable and validation failures not", async () => {
    const sendFails = new PostCoordinator({
      store: await createStore(ready),
      scheduler: { notifyPosted: vi.fn() },
      sender: failingSender("timeout"),
      isReadable: readable,
    });
    const notConfigured = new PostCoordinator({
      store: await createStore(),
      scheduler: { notifyPosted: vi.fn() },
      sender: okSender(),
      isReadable: readable,
    });

    const sendOutcome = await sendFails.runScheduled();
    const configOutcome = await notConfigured.runScheduled();

    expect(sendOutcome).toMatchObject({ ok: false, retryable: true });
    expect(configOutcome).toMatchObject({ ok: false, retryable: false });
  });

  it("still reports the post when saving lastPostTime fails", async () => {
    let failWrites = false;
    const store = await createStore({
      ...ready,
      writer: async () => {
        if (failWrites) throw new Error("disk full");
      },
    });
    const scheduler = { notifyPosted: vi.fn() };
    const coordinator = new PostCoordinator({
      store,
      scheduler,
      sender: okSender(),
      now: () => T0,
      isReadable: readable,
    });
    failWrites = true;

    const result = await coordinator.postNow("manual");

    expect(result.ok).toBe(true);
    if (!result.ok || result.status !== "posted") return;
    expect(result.postedAt).toBe(T0_SEC);
    expect(result.persistError?.message).toBe("Could not save config: disk full");
    expect(scheduler.notifyPosted).toHaveBeenCalledWith(T0_SEC);
    expect(store.current().lastPostTime).toBeNull();
  });

  it("never runs two sends at once", async () => {
    const store = await createStore(ready);
    let active = 0;
    let maxActive = 0;
    const sender: PhotoSender = {
      sendPhoto: vi.fn(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
      }),
    };
    const coordinator = new PostCoordinator({
      store,
      scheduler: { notifyPosted: vi.fn() },
      sender,
      isReadable: readable,
    });

    const results = await Promise.all([
      coordinator.postNow("manual"),
      coordinator.postNow("manual"),
      coordinator.postNow("manual"),
    ]);

    expect(results.every((r) => r.ok)).toBe(true);
    expect(sender.sendPhoto).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);
  });

  it("retries a failing scheduled post, then tells the admin and waits a full interval", async () => {
    let clock = T0;
    const timers: { at: number; fn: () => void; live: boolean }[] = [];
    const armTimer: ArmTimer = (at, fn) => {
      const timer = { at: at.getTime(), fn, live: true };
      timers.push(timer);
      return {
        cancel: () => {
          timer.live = false;
        },
      };
    };
    const fireNext = () => {
      const pending = timers.filter((t) => t.live);
      expect(pending).toHaveLength(1);
      const [timer] = pending;
      timer.live = false;
      clock = timer.at;
      timer.fn();
    };

    const store = await createStore({ ...ready, postInterval: HOUR });
    const onFailure = vi.fn();
    const scheduler = new IntervalScheduler({
      armTimer,
      now: () => clock,
      retryDelayMs: 30_000,
      maxRetries: 3,
      onFailure,
    });
    const sender = failingSender("network down");
    const coordinator = new PostCoordinator({
      store,
      scheduler,
      sender,
      now: () => clock,
      isReadable: readable,
    });

    scheduler.initialize(store.current(), () => coordinator.runScheduled());
    await scheduler.drain();
    for (let i = 0; i < 3; i++) {
      fireNext();
      await scheduler.drain();
    }

    expect(sender.sendPhoto).toHaveBeenCalledTimes(4);
    expect(onFailure).toHaveBeenCalledTimes(1);
    const [report] = onFailure.mock.calls[0];
    expect(report).toMatchObject({
      attempts: 4,
      exhausted: true,
      nextDueAt: T0 + HOUR * 1000,
    });
    expect(report.error.message).toBe("Error posting picture: network down");
    expect(scheduler.nextDueAt).toBe(T0 + HOUR * 1000);
    expect(store.current().lastPostTime).toBeNull();
  });
});
