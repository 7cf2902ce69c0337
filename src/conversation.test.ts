import { beforeEach, describe, expect, it } from "vitest";
import { AddConversation } from "./conversation";
import { Prompts } from "./messages";

const today = "2025-11-13";

describe("AddConversation", () => {
  let conversation: AddConversation;
  const key = AddConversation.key(100, 42);

  beforeEach(() => {
    conversation = new AddConversation();
  });

  it("keys flows by chat and user", () => {
    expect(key).toBe("100:42");
  });

  it("walks through category, amount, date and description", () => {
    expect(conversation.start(key)).toBe(Prompts.category);
    expect(conversation.advance(key, "food", today)).toEqual({ kind: "prompt", text: Prompts.amount });
    expect(conversation.advance(key, "₹250", today)).toEqual({ kind: "prompt", text: Prompts.date });
    expect(conversation.advance(key, "yesterday", today)).toEqual({
      kind: "prompt",
      text: Prompts.description,
    });
    expect(conversation.advance(key, "  team lunch ", today)).toEqual({
      kind: "complete",
      entry: { category: "food", amount: 250, date: "2025-11-12", description: "team lunch" },
    });
    expect(conversation.isActive(key)).toBe(false);
  });

  it("repeats a question when the answer does not parse", () => {
    conversation.start(key);
    conversation.advance(key, "petrol", today);
    expect(conversation.advance(key, "lots", today)).toEqual({
      kind: "prompt",
      text: Prompts.amountRetry,
    });
    conversation.advance(key, "500", today);
    expect(conversation.advance(key, "someday", today)).toEqual({
      kind: "prompt",
      text: Prompts.dateRetry,
    });
    expect(conversation.isActive(key)).toBe(true);
  });

  it("ignores answers outside a flow", () => {
    expect(conversation.advance(key, "food", today)).toBeNull();
  });

  it("cancels only an active flow", () => {
    conversation.start(key);
    expect(conversation.cancel(key)).toBe(true);
    expect(conversation.cancel(key)).toBe(false);
  });

  it("keeps flows of different users apart", () => {
    const other = AddConversation.key(100, 7);
    conversation.start(key);
    expect(conversation.isActive(other)).toBe(false);
    expect(conversation.advance(other, "food", today)).toBeNull();
  });
});
