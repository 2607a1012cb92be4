import { ask, confirm } from "./prompt";

export type SelectorOption<T extends string> = {
  value: T;
  label: string;
  detail?: string;
};

export type SelectorRequest<T extends string> = {
  title: string;
  subtitle?: string;
  options: SelectorOption<T>[];
  initialIndex: number;
  allowBack: boolean;
};

export type SelectorResult<T extends string> =
  | { action: "select"; value: T; index: number }
  | { action: "back" }
  | { action: "cancel" };

export interface Selector {
  selectOne<T extends string>(request: SelectorRequest<T>): Promise<SelectorResult<T>>;
  confirm(question: string): Promise<boolean>;
}

function clampIndex(index: number, length: number): number {
  if (length === 0) {
    return 0;
  }
  return Math.min(Math.max(index, 0), length - 1);
}

/**
 * Numbered-list selector on top of the readline prompt. An empty answer keeps
 * the highlighted option; `b` goes back and `q` cancels.
 */
export function createPromptSelector(): Selector {
  return {
    async selectOne<T extends string>(request: SelectorRequest<T>): Promise<SelectorResult<T>> {
      if (request.options.length === 0) {
        return { action: "cancel" };
      }
      const initial = clampIndex(request.initialIndex, request.options.length);
      console.log("");
      console.log(request.title);
      if (request.subtitle) {
        console.log(request.subtitle);
      }
      request.options.forEach((option, index) => {
        const marker = index === initial ? ">" : " ";
        const detail = option.detail ? `  ${option.detail}` : "";
        console.log(`${marker} ${index + 1}) ${option.label}${detail}`);
      });
      const controls = request.allowBack ? "[number, b=back, q=cancel]" : "[number, q=cancel]";
      while (true) {
        const answer = (await ask(`${controls} (${initial + 1}): `)).toLowerCase();
        if (answer === "q") {
          return { action: "cancel" };
        }
        if (answer === "b" && request.allowBack) {
          return { action: "back" };
        }
        const index = answer === "" ? initial : Number.parseInt(answer, 10) - 1;
        const option = request.options[index];
        if (Number.isInteger(index) && option) {
          return { action: "select", value: option.value, index };
        }
        console.log(`Choose 1-${request.options.length}.`);
      }
    },
    confirm: (question) => confirm(question)
  };
}
