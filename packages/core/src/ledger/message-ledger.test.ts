import { describe, it, expect } from "vitest";
import { createMessageLedger, AGENT_OUTPUT_TOOL } from "./index.js";
import { InvalidArgumentError } from "@tallyline/sdk";
import type { IMessageLedger } from "@tallyline/sdk";
import {
  aiMessage,
  entry,
  stateMessage,
  systemMessage,
  toolResultMessage,
} from "@tallyline/sdk/testing";

function entrySum(ledger: IMessageLedger): number {
  return ledger.entries().reduce((acc, e) => acc + e.metadata.tokens, 0);
}

function roles(ledger: IMessageLedger): string[] {
  return ledger.snapshotMessages().map((m) => m.role);
}

describe("MessageLedger", () => {
  it("starts empty", () => {
    const ledger = createMessageLedger();
    expect(ledger.size).toBe(0);
    expect(ledger.totalTokens()).toBe(0);
    expect(ledger.snapshotMessages()).toEqual([]);
    expect(ledger.nextToolCallId).toBe(1);
  });

  describe("add()", () => {
    it("appends and accumulates tokens", () => {
      const ledger = createMessageLedger();
      ledger.add(systemMessage("rules"), { tokens: 5 });
      ledger.add(stateMessage("page A"), { tokens: 20, messageType: "state" });

      expect(roles(ledger)).toEqual(["system", "human"]);
      expect(ledger.totalTokens()).toBe(25);
      expect(ledger.entryAt(1)?.metadata).toEqual({ tokens: 20, messageType: "state" });
    });

    it("inserts at a position", () => {
      const ledger = createMessageLedger();
      ledger.add(stateMessage("a"), { tokens: 1 });
      ledger.add(stateMessage("b"), { tokens: 2 });
      ledger.add(systemMessage("rules"), { tokens: 3 }, 0);
      ledger.add(aiMessage("end"), { tokens: 4 }, 3);

      expect(ledger.snapshotMessages()).toEqual([
        systemMessage("rules"),
        stateMessage("a"),
        stateMessage("b"),
        aiMessage("end"),
      ]);
      expect(ledger.totalTokens()).toBe(10);
    });

    it("accepts zero-cost entries", () => {
      const ledger = createMessageLedger();
      ledger.add(stateMessage("free"), { tokens: 0 });
      expect(ledger.size).toBe(1);
      expect(ledger.totalTokens()).toBe(0);
    });

    it("rejects a negative token cost without mutating", () => {
      const ledger = createMessageLedger();
      expect(() => ledger.add(stateMessage("x"), { tokens: -1 })).toThrow(InvalidArgumentError);
      expect(ledger.size).toBe(0);
      expect(ledger.totalTokens()).toBe(0);
    });

    it("rejects a fractional token cost", () => {
      const ledger = createMessageLedger();
      expect(() => ledger.add(stateMessage("x"), { tokens: 1.5 })).toThrow(
        'Invalid argument "tokens": must be a non-negative integer, got 1.5',
      );
    });

    it("rejects out-of-range positions", () => {
      const ledger = createMessageLedger();
      ledger.add(stateMessage("a"), { tokens: 1 });

      expect(() => ledger.add(stateMessage("x"), { tokens: 1 }, 2)).toThrow(InvalidArgumentError);
      expect(() => ledger.add(stateMessage("x"), { tokens: 1 }, -1)).toThrow(InvalidArgumentError);
      expect(ledger.size).toBe(1);
      expect(ledger.totalTokens()).toBe(1);
    });
  });

  describe("addAgentTurn()", () => {
    it("appends an ai entry and its tool-result, raising the total by 110", () => {
      const ledger = createMessageLedger();
      ledger.add(stateMessage("page"), { tokens: 30 });

      const id = ledger.addAgentTurn({ action: [{ click_element: { index: 2 } }] });

      expect(id).toBe("1");
      expect(ledger.size).toBe(3);
      expect(ledger.totalTokens()).toBe(140);
      expect(ledger.entryAt(1)).toEqual({
        message: {
          role: "ai",
          content: "",
          toolCalls: [
            { id: "1", name: AGENT_OUTPUT_TOOL, args: { action: [{ click_element: { index: 2 } }] } },
          ],
        },
        metadata: { tokens: 100 },
      });
      expect(ledger.entryAt(2)).toEqual({
        message: { role: "tool-result", content: "", toolCallId: "1" },
        metadata: { tokens: 10 },
      });
    });

    it("gives each turn its own invocation id", () => {
      const ledger = createMessageLedger();
      expect(ledger.addAgentTurn({ step: 1 })).toBe("1");
      expect(ledger.addAgentTurn({ step: 2 })).toBe("2");
      expect(ledger.nextToolCallId).toBe(3);

      const results = ledger
        .snapshotMessages()
        .flatMap((m) => (m.role === "tool-result" ? [m.toolCallId] : []));
      expect(results).toEqual(["1", "2"]);
    });

    it("stores a copy of the decision", () => {
      const ledger = createMessageLedger();
      const action: Record<string, unknown>[] = [{ click_element: { index: 1 } }];

      ledger.addAgentTurn({ action });
      action[0] = { done: {} };

      const stored = ledger.entryAt(0)?.message;
      expect(stored?.role === "ai" ? stored.toolCalls?.[0].args : undefined).toEqual({
        action: [{ click_element: { index: 1 } }],
      });
    });

    it("continues from a supplied counter", () => {
      const ledger = createMessageLedger({ nextToolCallId: 7 });
      expect(ledger.addAgentTurn({})).toBe("7");
    });

    it("uses configured turn costs", () => {
      const ledger = createMessageLedger({ agentTurnTokens: 40, toolResultTokens: 2 });
      ledger.addAgentTurn({});
      expect(ledger.totalTokens()).toBe(42);
    });
  });

  describe("snapshotMessages()", () => {
    it("returns a fresh array each call", () => {
      const ledger = createMessageLedger();
      ledger.add(stateMessage("a"), { tokens: 1 });

      const first = ledger.snapshotMessages();
      first.pop();
      expect(ledger.snapshotMessages()).toHaveLength(1);
    });
  });

  describe("removeOldestNonSystem()", () => {
    it("removes the first non-system entry", () => {
      const ledger = createMessageLedger();
      ledger.add(systemMessage("rules"), { tokens: 5 });
      ledger.add(stateMessage("old"), { tokens: 20 });
      ledger.add(stateMessage("new"), { tokens: 30 });

      const removed = ledger.removeOldestNonSystem();

      expect(removed?.message).toEqual(stateMessage("old"));
      expect(ledger.snapshotMessages()).toEqual([systemMessage("rules"), stateMessage("new")]);
      expect(ledger.totalTokens()).toBe(35);
    });

    it("is a no-op when only system entries remain", () => {
      const ledger = createMessageLedger();
      ledger.add(systemMessage("a"), { tokens: 5 });
      ledger.add(systemMessage("b"), { tokens: 6 });

      expect(ledger.removeOldestNonSystem()).toBeUndefined();
      expect(ledger.size).toBe(2);
      expect(ledger.totalTokens()).toBe(11);
    });

    it("is a no-op on an empty ledger", () => {
      const ledger = createMessageLedger();
      expect(ledger.removeOldestNonSystem()).toBeUndefined();
    });
  });

  describe("removeTrailingStateIfPresent()", () => {
    it("removes a trailing human entry when more than two entries exist", () => {
      const ledger = createMessageLedger();
      ledger.add(systemMessage("rules"), { tokens: 5 });
      ledger.add(aiMessage("ok"), { tokens: 10 });
      ledger.add(stateMessage("latest"), { tokens: 40 });

      const removed = ledger.removeTrailingStateIfPresent();

      expect(removed?.metadata.tokens).toBe(40);
      expect(ledger.size).toBe(2);
      expect(ledger.totalTokens()).toBe(15);
    });

    it("is a no-op with exactly two entries", () => {
      const ledger = createMessageLedger();
      ledger.add(systemMessage("rules"), { tokens: 5 });
      ledger.add(stateMessage("latest"), { tokens: 40 });

      expect(ledger.removeTrailingStateIfPresent()).toBeUndefined();
      expect(ledger.size).toBe(2);
      expect(ledger.totalTokens()).toBe(45);
    });

    it("is a no-op when the last entry is not human", () => {
      const ledger = createMessageLedger();
      ledger.add(systemMessage("rules"), { tokens: 5 });
      ledger.add(stateMessage("page"), { tokens: 20 });
      ledger.add(toolResultMessage("1"), { tokens: 10 });

      expect(ledger.removeTrailingStateIfPresent()).toBeUndefined();
      expect(ledger.size).toBe(3);
    });
  });

  describe("removeAt()", () => {
    it("removes by index and keeps the total consistent", () => {
      const ledger = createMessageLedger({
        entries: [entry(stateMessage("a"), 1), entry(stateMessage("b"), 2), entry(stateMessage("c"), 3)],
      });

      expect(ledger.removeAt(1).message).toEqual(stateMessage("b"));
      expect(ledger.totalTokens()).toBe(4);
      expect(ledger.totalTokens()).toBe(entrySum(ledger));
    });

    it("throws on an out-of-range index", () => {
      const ledger = createMessageLedger();
      expect(() => ledger.removeAt(0)).toThrow(InvalidArgumentError);
    });
  });

  describe("initial entries", () => {
    it("computes the total from the given entries", () => {
      const ledger = createMessageLedger({
        entries: [entry(systemMessage("rules"), 5), entry(stateMessage("page"), 20, "state")],
      });
      expect(ledger.size).toBe(2);
      expect(ledger.totalTokens()).toBe(25);
    });

    it("rejects negative costs", () => {
      expect(() => createMessageLedger({ entries: [entry(stateMessage("x"), -3)] })).toThrow(
        InvalidArgumentError,
      );
    });
  });

  it("keeps the cached total equal to the entry sum across mixed operations", () => {
    const ledger = createMessageLedger();
    ledger.add(systemMessage("rules"), { tokens: 7 });
    ledger.add(stateMessage("s1"), { tokens: 13 });
    ledger.addAgentTurn({ action: [{ go_to_url: { url: "https://example.com" } }] });
    ledger.add(stateMessage("s2"), { tokens: 21 }, 1);
    ledger.removeOldestNonSystem();
    ledger.add(stateMessage("s3"), { tokens: 8 });
    ledger.removeTrailingStateIfPresent();

    expect(ledger.totalTokens()).toBe(entrySum(ledger));
    expect(ledger.totalTokens()).toBe(7 + 13 + 110);
  });

  it("entries are frozen", () => {
    const ledger = createMessageLedger();
    ledger.add(stateMessage("a"), { tokens: 1 });
    const first = ledger.entries()[0];
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.metadata)).toBe(true);
  });
});
