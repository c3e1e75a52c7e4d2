/**
 * Serializable form of a session, returned by `shutdownResumable()` and
 * accepted by a new shard to resume across restarts.
 */
export interface ResumeSession {
	sessionId: string;
	sequence: number;
	resumeUrl: string | null;
}

/**
 * Gateway session created by Ready. The sequence never moves backwards.
 */
export class Session {
	private currentSequence: number;

	constructor(
		readonly id: string,
		sequence: number,
		readonly resumeUrl: string | null
	) {
		this.currentSequence = sequence;
	}

	static from(resume: ResumeSession): Session {
		return new Session(resume.sessionId, resume.sequence, resume.resumeUrl);
	}

	get sequence(): number {
		return this.currentSequence;
	}

	/** Returns the previous sequence. */
	setSequence(sequence: number): number {
		const previous = this.currentSequence;
		if (sequence > previous) {
			this.currentSequence = sequence;
		}
		return previous;
	}

	toJSON(): ResumeSession {
		return { sessionId: this.id, sequence: this.currentSequence, resumeUrl: this.resumeUrl };
	}
}
