import ora, { type Ora } from "ora";

export function createSpinner(text: string): Ora {
	return ora({ text, color: "cyan" });
}

/**
 * Run a task behind a spinner; the spinner succeeds with `successText`
 * (or the task text) and fails with the task text before rethrowing.
 */
export async function withSpinner<T>(
	text: string,
	fn: () => Promise<T>,
	successText?: string,
): Promise<T> {
	const spinner = createSpinner(text).start();
	try {
		const result = await fn();
		spinner.succeed(successText ?? text);
		return result;
	} catch (error) {
		spinner.fail(text);
		throw error;
	}
}
