import { findDate, parseAmount } from "./parsing";
import { Prompts } from "./messages";

type AddState =
  | { step: "category" }
  | { step: "amount"; category: string }
  | { step: "date"; category: string; amount: number }
  | { step: "description"; category: string; amount: number; date: string };

export type AddEntry = {
  category: string;
  amount: number;
  date: string;
  description: string;
};

export type AddResult =
  | { kind: "prompt"; text: string }
  | { kind: "complete"; entry: AddEntry };

/**
 * State of the interactive `/add` flow, one per chat and user.
 * Category, amount, date and description are asked for in that order;
 * an answer that doesn't parse repeats the question.
 */
export class AddConversation {
  private states = new Map<string, AddState>();

  static key(chatId: number, userId: number) {
    return `${chatId}:${userId}`;
  }

  start(key: string): string {
    this.states.set(key, { step: "category" });
    return Prompts.category;
  }

  isActive(key: string): boolean {
    return this.states.has(key);
  }

  cancel(key: string): boolean {
    return this.states.delete(key);
  }

  /** Feeds one answer into an active flow. */
  advance(key: string, text: string, today: string): AddResult | null {
    const state = this.states.get(key);
    if (state === undefined) {
      return null;
    }
    const answer = text.trim();

    switch (state.step) {
      case "category":
        if (answer === "") {
          return { kind: "prompt", text: Prompts.category };
        }
        this.states.set(key, { step: "amount", category: answer });
        return { kind: "prompt", text: Prompts.amount };

      case "amount": {
        const amount = parseAmount(answer);
        if (amount === null) {
          return { kind: "prompt", text: Prompts.amountRetry };
        }
        this.states.set(key, { step: "date", category: state.category, amount });
        return { kind: "prompt", text: Prompts.date };
      }

      case "date": {
        const date = findDate(answer, today);
        if (date === null) {
          return { kind: "prompt", text: Prompts.dateRetry };
        }
        this.states.set(key, { ...state, step: "description", date });
        return { kind: "prompt", text: Prompts.description };
      }

      case "description":
        this.states.delete(key);
        return {
          kind: "complete",
          entry: {
            category: state.category,
            amount: state.amount,
            date: state.date,
            description: answer,
          },
        };
    }
  }
}
