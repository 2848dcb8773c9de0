/**
 * Tests for the ticker price feed (stream parsing and poll fallback)
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { PriceFeed, parseTickerMessage, type FeedMode } from "../../src/exchange/price-feed";
import type { PriceTick } from "../../src/domain/trade.types";
import { createNullLogger } from "../../src/utils/logger.util";

function tickerFrame(instId: string, lastPr: string): string {
  return JSON.stringify({
    action: "snapshot",
    arg: { instType: "USDT-FUTURES", channel: "ticker", instId },
    data: [{ instId, lastPr }],
  });
}

function setup(poll: (symbol: string) => Promise<number> = async () => 100) {
  const clock = { now: 1000 };
  const feed = new PriceFeed({ wsUrl: "", poll, logger: createNullLogger(), now: () => clock.now });
  const ticks: PriceTick[] = [];
  const modes: Array<[FeedMode, string]> = [];
  feed.onTick((tick) => ticks.push(tick));
  feed.onModeChange((mode, reason) => modes.push([mode, reason]));
  return { feed, clock, ticks, modes };
}

describe("parseTickerMessage", () => {
  it("should read ticks from ticker pushes", () => {
    assert.deepStrictEqual(parseTickerMessage(tickerFrame("BTCUSDT", "60123.5"), 42), [
      { symbol: "BTCUSDT", price: 60123.5, at: 42, source: "stream" },
    ]);
  });

  it("should ignore pong, garbage, other channels and non-positive prices", () => {
    assert.deepStrictEqual(parseTickerMessage("pong", 1), []);
    assert.deepStrictEqual(parseTickerMessage("{not json", 1), []);
    assert.deepStrictEqual(
      parseTickerMessage(JSON.stringify({ arg: { channel: "books" }, data: [{ instId: "BTCUSDT", lastPr: "1" }] }), 1),
      [],
    );
    assert.deepStrictEqual(parseTickerMessage(tickerFrame("BTCUSDT", "0"), 1), []);
  });
});

describe("PriceFeed", () => {
  it("should start in poll mode", () => {
    const { feed } = setup();
    assert.strictEqual(feed.getMode(), "poll");
    assert.strictEqual(feed.getState(), "DISCONNECTED");
  });

  it("should publish stream ticks only for watched symbols", () => {
    const { feed, ticks, modes } = setup();
    feed.watch("BTCUSDT");

    feed.handleStreamFrame(tickerFrame("ETHUSDT", "3000"));
    assert.strictEqual(ticks.length, 0);

    feed.handleStreamFrame(tickerFrame("BTCUSDT", "60000"));
    assert.deepStrictEqual(ticks, [{ symbol: "BTCUSDT", price: 60000, at: 1000, source: "stream" }]);
    assert.deepStrictEqual(feed.getLatest("BTCUSDT"), ticks[0]);
    assert.strictEqual(feed.getMode(), "stream");
    assert.deepStrictEqual(modes, [["stream", "stream tick"]]);
  });

  it("should fall back to polling while the stream is down", async () => {
    const { feed, ticks, modes, clock } = setup(async (symbol) => (symbol === "BTCUSDT" ? 59000 : 2900));
    feed.watch("BTCUSDT");
    feed.handleStreamFrame(tickerFrame("BTCUSDT", "60000"));

    clock.now = 2000;
    await feed.pollOnce();

    assert.strictEqual(feed.getMode(), "poll");
    assert.deepStrictEqual(modes[modes.length - 1], ["poll", "stream disconnected"]);
    assert.deepStrictEqual(ticks[ticks.length - 1], { symbol: "BTCUSDT", price: 59000, at: 2000, source: "poll" });
  });

  it("should keep polling other symbols when one poll fails", async () => {
    const { feed } = setup(async (symbol) => {
      if (symbol === "BTCUSDT") throw new Error("ticker unavailable");
      return 3000;
    });
    feed.watch("BTCUSDT");
    feed.watch("ETHUSDT");

    await feed.pollOnce();

    assert.strictEqual(feed.getLatest("BTCUSDT"), undefined);
    assert.strictEqual(feed.getLatest("ETHUSDT")?.price, 3000);
  });

  it("should forget the latest tick on unwatch", async () => {
    const { feed } = setup();
    feed.watch("BTCUSDT");
    await feed.pollOnce();
    assert.strictEqual(feed.getLatest("BTCUSDT")?.price, 100);

    feed.unwatch("BTCUSDT");
    assert.strictEqual(feed.getLatest("BTCUSDT"), undefined);
  });

  it("should stop cleanly without a WebSocket URL", () => {
    const { feed } = setup();
    feed.start();
    feed.stop();
    assert.strictEqual(feed.getState(), "DISCONNECTED");
  });
});
