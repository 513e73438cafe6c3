/**
 * Resume point for the firehose: `time_us` of the newest processed message.
 * Lives for the process only; a restart resumes from the live tip.
 */
export class FirehoseCursor {
  private value: number | null = null;

  get(): number | null {
    return this.value;
  }

  advance(timeUs: number): void {
    if (this.value === null || timeUs > this.value) {
      this.value = timeUs;
    }
  }
}
