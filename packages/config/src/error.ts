/**
 * Configuration Errors
 */

import type { ZodError } from "zod";

export interface ConfigIssue {
	field: string;
	message: string;
}

export class GatewayConfigError extends Error {
	constructor(
		message: string,
		public readonly code: "VALIDATION_FAILED" | "LOAD_FAILED",
		public readonly issues: ConfigIssue[] = [],
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "GatewayConfigError";
	}

	static validationFailed(error: ZodError): GatewayConfigError {
		const issues = error.issues.map((issue) => ({
			field: issue.path.join(".") || "(root)",
			message: issue.message,
		}));
		const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
		return new GatewayConfigError(
			`Gateway config validation failed: ${summary}`,
			"VALIDATION_FAILED",
			issues
		);
	}

	static loadFailed(path: string, cause: unknown): GatewayConfigError {
		const reason = cause instanceof Error ? cause.message : String(cause);
		return new GatewayConfigError(`Failed to load YAML from ${path}: ${reason}`, "LOAD_FAILED", [], {
			cause,
		});
	}
}
