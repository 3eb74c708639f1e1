/**
 * UI-layer contracts for logging/spinners.
 *
 * `@clack/prompts` is wrapped in `clack-ui.ts`; flows only see this shape so
 * they can run against a recording fake in tests.
 */

export type UiSession = {
  intro(message: string): void;
  outro(message: string): void;
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  runSpinner<TResult>(
    title: string,
    work: () => Promise<TResult>
  ): Promise<TResult>;
  print(text: string): void;
};

export type OutputStream = {
  write(chunk: string): unknown;
};
