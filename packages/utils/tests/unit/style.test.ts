import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { Style } from "../../src/style";

describe("Style", () => {
  describe("noColor mode", () => {
    test("disables ANSI tokens when noColor is true", () => {
      const s = new Style({ noColor: true });
      expect(s.enabled()).toBe(false);
      expect(s.token("red")).toBe("");
      expect(s.token("reset")).toBe("");
    });

    test("wrap() and helpers return plain text", () => {
      const s = new Style({ noColor: true });
      expect(s.wrap("hello", "bold", "red")).toBe("hello");
      expect(s.side("Buy", "buy")).toBe("Buy");
      expect(s.signed("+1.20", "1.2")).toBe("+1.20");
      expect(s.alert("! FAIL")).toBe("! FAIL");
    });
  });

  describe("color mode", () => {
    // NO_COLOR in the environment wins over the constructor flag.
    let originalNoColor: string | undefined;

    beforeEach(() => {
      originalNoColor = process.env.NO_COLOR;
      delete process.env.NO_COLOR;
    });

    afterEach(() => {
      if (originalNoColor !== undefined) {
        process.env.NO_COLOR = originalNoColor;
      } else {
        delete process.env.NO_COLOR;
      }
    });

    test("enables ANSI tokens when NO_COLOR env is unset", () => {
      const s = new Style({ noColor: false });
      expect(s.enabled()).toBe(true);
      expect(s.token("red")).toBe("\x1b[31m");
      expect(s.token("reset")).toBe("\x1b[0m");
    });

    test("wrap() combines tokens and resets", () => {
      const s = new Style({ noColor: false });
      expect(s.wrap("ERROR", "bold", "red")).toBe("\x1b[1m\x1b[31mERROR\x1b[0m");
      expect(s.wrap("plain")).toBe("plain");
    });

    test("side() colors buy green and sell red", () => {
      const s = new Style({ noColor: false });
      expect(s.side("Buy", "buy")).toBe("\x1b[32mBuy\x1b[0m");
      expect(s.side("Sell", "sell")).toBe("\x1b[31mSell\x1b[0m");
    });

    test("signed() colors by sign and leaves zero plain", () => {
      const s = new Style({ noColor: false });
      expect(s.signed("2.50", "2.5")).toBe("\x1b[32m2.50\x1b[0m");
      expect(s.signed("-0.10", "-0.1")).toBe("\x1b[31m-0.10\x1b[0m");
      expect(s.signed("0.00", "0")).toBe("0.00");
      expect(s.signed("n/a", "n/a")).toBe("n/a");
    });

    test("NO_COLOR env var disables styling", () => {
      process.env.NO_COLOR = "1";
      const s = new Style({ noColor: false });
      expect(s.enabled()).toBe(false);
    });
  });
});
