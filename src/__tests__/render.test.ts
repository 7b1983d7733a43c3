import { describe, it, expect, vi } from "vitest";
import { inlineFrames, waitConditionMet, MAX_FRAMES } from "../fetcher/render.js";

const PAGE = "https://example.com/docs/page";

// ---------------------------------------------------------------------------
// 1. waitConditionMet
// ---------------------------------------------------------------------------
describe("waitConditionMet", () => {
  const html = '<html><body><main class="content"><p>Hi</p></main></body></html>';

  it.each(["load", "domcontentloaded", "networkidle"] as const)(
    "should hold for %s",
    (condition) => {
      expect(waitConditionMet(html, condition)).toBe(true);
    },
  );

  it("should hold when the css selector matches", () => {
    expect(waitConditionMet(html, "css:main.content")).toBe(true);
  });

  it("should not hold when the css selector does not match", () => {
    expect(waitConditionMet(html, "css:#missing")).toBe(false);
  });

  it("should not hold for an invalid selector", () => {
    expect(waitConditionMet(html, "css:[[[")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// 2. inlineFrames
// ---------------------------------------------------------------------------
describe("inlineFrames", () => {
  it("should return the page unchanged when it has no frames", async () => {
    const html = "<html><body><p>Plain</p></body></html>";
    const loadFrame = vi.fn();

    await expect(inlineFrames(html, PAGE, loadFrame)).resolves.toBe(html);
    expect(loadFrame).not.toHaveBeenCalled();
  });

  it("should replace a same-origin frame with its body", async () => {
    const html = '<html><body><iframe src="/frames/one"></iframe></body></html>';
    const loadFrame = vi
      .fn()
      .mockResolvedValue("<html><body><p>One</p></body></html>");

    const result = await inlineFrames(html, PAGE, loadFrame);

    expect(loadFrame).toHaveBeenCalledWith("https://example.com/frames/one");
    expect(result).toContain(
      '<div data-frame-src="https://example.com/frames/one"><p>One</p></div>',
    );
    expect(result).not.toContain("<iframe");
  });

  it("should mark cross-origin frames and leave them in place", async () => {
    const html = '<html><body><iframe src="https://other.example.org/x"></iframe></body></html>';
    const loadFrame = vi.fn();

    const result = await inlineFrames(html, PAGE, loadFrame);

    expect(loadFrame).not.toHaveBeenCalled();
    expect(result).toContain(
      '<iframe src="https://other.example.org/x" data-frame-error="cross-origin"></iframe>',
    );
  });

  it("should record the load error on a frame that fails", async () => {
    const html = '<html><body><iframe src="/broken"></iframe></body></html>';
    const loadFrame = vi.fn().mockRejectedValue(new Error("HTTP 500"));

    const result = await inlineFrames(html, PAGE, loadFrame);

    expect(result).toContain('<iframe src="/broken" data-frame-error="HTTP 500"></iframe>');
  });

  it(`should inline at most ${MAX_FRAMES} frames`, async () => {
    const frames = Array.from(
      { length: MAX_FRAMES + 2 },
      (_, i) => `<iframe src="/f${i}"></iframe>`,
    ).join("");
    const loadFrame = vi.fn().mockResolvedValue("<p>x</p>");

    await inlineFrames(`<html><body>${frames}</body></html>`, PAGE, loadFrame);

    expect(loadFrame).toHaveBeenCalledTimes(MAX_FRAMES);
  });
});
