import ora from "ora";

export type SpinnerText<T> = {
  start: string;
  succeed?: (result: T) => string;
  fail?: string;
};

export const withSpinner = async <T>(run: () => Promise<T>, text: SpinnerText<T>): Promise<T> => {
  const spinner = ora(text.start).start();
  try {
    const result = await run();
    spinner.succeed(text.succeed ? text.succeed(result) : text.start);
    return result;
  } catch (error) {
    spinner.fail(text.fail ?? text.start);
    throw error;
  }
};
