import { describe, expect, test } from "vitest";
import { countsLine, notificationTitle, rfc3339 } from "../../src/notify/message";
import { ntfyMessage } from "../../src/notify/ntfy";
import { slackMessage } from "../../src/notify/slack";
import { telegramText } from "../../src/notify/telegram";

const partial = { succeeded: 4, failed: 1, skipped: 2 };

describe("notification text", () => {
  test("titles follow the run outcome", () => {
    expect(notificationTitle({ succeeded: 2, failed: 0, skipped: 0 })).toBe("backups succeeded");
    expect(notificationTitle(partial)).toBe("backups completed with errors");
    expect(notificationTitle({ succeeded: 0, failed: 1, skipped: 0 })).toBe("backups failed");
    expect(notificationTitle({ succeeded: 0, failed: 0, skipped: 0 })).toBe("backups failed");
  });

  test("rfc3339 drops milliseconds", () => {
    expect(rfc3339(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678)))).toBe("2024-01-02T03:04:05Z");
  });

  test("countsLine", () => {
    expect(countsLine(partial)).toBe("completed: 4, failed: 1");
  });

  test("ntfy shows the first error only", () => {
    expect(ntfyMessage(partial, ["GitHub soba/a: boom", "GitHub soba/b: bang"])).toBe(
      "completed: 4, failed: 1\nerror: GitHub soba/a: boom",
    );
    expect(ntfyMessage({ succeeded: 1, failed: 0, skipped: 0 }, [])).toBe("completed: 1, failed: 0");
  });

  test("telegram text", () => {
    expect(telegramText(partial, ["GitHub soba/a: boom"])).toBe(
      "backups completed with errors\ncompleted: 4, failed: 1\nerror: GitHub soba/a: boom",
    );
  });

  test("slack attachment lists every error", () => {
    expect(slackMessage("C123", partial, ["a: x", "b: y"])).toEqual({
      channel: "C123",
      text: "backups completed with errors",
      attachments: [{ pretext: "succeeded: 4, failed: 1", text: "a: x\nb: y" }],
    });
  });
});
