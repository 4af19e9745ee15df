import ora from 'ora';

/**
 * Run a task behind an ora spinner, marking it succeeded or failed.
 * Errors are rethrown after the spinner is stopped.
 */
export async function withSpinner<T>(
  text: string,
  success: string | ((result: T) => string),
  failure: string,
  task: () => Promise<T>
): Promise<T> {
  const spinner = ora(text).start();

  try {
    const result = await task();
    spinner.succeed(typeof success === 'string' ? success : success(result));
    return result;
  } catch (error) {
    spinner.fail(failure);
    throw error;
  }
}
