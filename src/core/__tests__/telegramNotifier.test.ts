import { describe, it, expect, vi, beforeEach } from "vitest";
import { TelegramNotifier } from "../telegramNotifier.js";

type MessageListener = (msg: { chat: { id: number }; text?: string }) => void;

const bot = vi.hoisted(() => ({
  sendMessage: vi.fn(async (_chatId: string, _text: string, _options?: object) => ({})),
  on: vi.fn((_event: string, _listener: MessageListener) => undefined),
  startPolling: vi.fn(async () => undefined),
  stopPolling: vi.fn(async () => undefined),
  isPolling: vi.fn(() => true)
}));

vi.mock("node-telegram-bot-api", () => ({
  default: vi.fn(function () {
    return bot;
  })
}));

vi.mock("../../utils/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const portfolio = {
  snapshot: () => ({ capital: 200, openCount: 0, maxPositions: 4, realizedPnl: 0 }),
  listPositions: () => []
};

const messageListener = (): MessageListener | undefined =>
  bot.on.mock.calls.find(([event]) => event === "message")?.[1];

describe("TelegramNotifier", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("sends plain text to the configured chat", async () => {
    const notifier = new TelegramNotifier("test-token", "42");

    await notifier.send("hello");

    expect(bot.sendMessage).toHaveBeenCalledWith("42", "hello", { disable_web_page_preview: true });
  });

  it("stays silent without a token", async () => {
    const notifier = new TelegramNotifier("", "42");

    await notifier.send("hello");
    notifier.listenForCommands(portfolio);

    expect(bot.sendMessage).not.toHaveBeenCalled();
    expect(bot.startPolling).not.toHaveBeenCalled();
  });

  it("answers commands from the admin chat only", () => {
    const notifier = new TelegramNotifier("test-token", "42");
    notifier.listenForCommands(portfolio);
    const listener = messageListener();

    listener?.({ chat: { id: 7 }, text: "/balance" });
    expect(bot.sendMessage).not.toHaveBeenCalled();

    listener?.({ chat: { id: 42 }, text: "/active" });
    expect(bot.startPolling).toHaveBeenCalledTimes(1);
    expect(bot.sendMessage).toHaveBeenCalledWith("42", "No active trades.", { disable_web_page_preview: true });
  });

  it("stops polling on shutdown", async () => {
    const notifier = new TelegramNotifier("test-token", "42");

    await notifier.stop();

    expect(bot.stopPolling).toHaveBeenCalledTimes(1);
  });
});
