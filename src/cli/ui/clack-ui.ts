import {
  cancel,
  intro as clackIntro,
  outro as clackOutro,
  isCancel,
  log,
  type Option,
  select,
  spinner,
  text,
} from "@clack/prompts";

import type { OutputStream, UiSession } from "./index";

export type SelectOption<TValue extends string> = Option<TValue>;

export type ClackUi = UiSession & {
  cancelAndExit(message: string): void;
  selectOne<TValue extends string>(
    message: string,
    options: readonly SelectOption<TValue>[]
  ): Promise<TValue | null>;
  askText(message: string, placeholder?: string): Promise<string | null>;
};

export type CreateClackUiOptions = {
  stdout?: OutputStream;
};

export function createClackUi(options: CreateClackUiOptions = {}): ClackUi {
  const stdout = options.stdout ?? process.stdout;

  function intro(message: string): void {
    clackIntro(message);
  }

  function outro(message: string): void {
    clackOutro(message);
  }

  function cancelAndExit(message: string): void {
    cancel(message);
  }

  async function selectOne<TValue extends string>(
    message: string,
    selectOptions: readonly SelectOption<TValue>[]
  ): Promise<TValue | null> {
    const value = await select({
      message,
      options: [...selectOptions],
      initialValue: selectOptions[0]?.value,
    });

    if (isCancel(value)) {
      return null;
    }

    const selected = selectOptions.find((option) => option.value === value);
    if (!selected) {
      throw new Error("Unexpected selection value");
    }
    return selected.value;
  }

  async function askText(
    message: string,
    placeholder?: string
  ): Promise<string | null> {
    const value = await text({
      message,
      placeholder,
      validate: (input) =>
        input === undefined || input.trim() === ""
          ? "A value is required"
          : undefined,
    });

    if (isCancel(value)) {
      return null;
    }
    return value.trim();
  }

  async function runSpinner<TResult>(
    title: string,
    work: () => Promise<TResult>
  ): Promise<TResult> {
    const s = spinner();
    s.start(title);
    try {
      const result = await work();
      s.stop("Done");
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : "Unknown error";
      s.stop(message, 1);
      throw error;
    }
  }

  function print(value: string): void {
    stdout.write(value);
    if (!value.endsWith("\n")) {
      stdout.write("\n");
    }
  }

  return {
    intro,
    outro,
    step: (message) => log.step(message),
    info: (message) => log.info(message),
    success: (message) => log.success(message),
    warn: (message) => log.warn(message),
    error: (message) => log.error(message),
    cancelAndExit,
    selectOne,
    askText,
    runSpinner,
    print,
  };
}
