/** Receives plan lines for the note editor that is currently open. */
export interface PlanSectionWriter {
  appendPlanLine(text: string): void;
}

/**
 * Holds plan lines while no note is open and writes them, in order, once one
 * opens. While a note is open lines go straight through.
 */
export class PlanLineStager {
  private writer: PlanSectionWriter | null = null;
  private buffered: string[] = [];

  stage(line: string) {
    if (this.writer) {
      this.writer.appendPlanLine(line);
      return;
    }
    this.buffered.push(line);
  }

  open(writer: PlanSectionWriter) {
    this.writer = writer;
    const lines = this.buffered;
    this.buffered = [];
    lines.forEach((line) => writer.appendPlanLine(line));
  }

  close() {
    this.writer = null;
  }

  /** Drop the most recent buffered copy of a line; lines already written stay in the note. */
  unstage(line: string) {
    const index = this.buffered.lastIndexOf(line);
    if (index !== -1) this.buffered.splice(index, 1);
  }

  clear() {
    this.buffered = [];
  }

  get isNoteOpen(): boolean {
    return this.writer !== null;
  }

  get pendingLines(): readonly string[] {
    return [...this.buffered];
  }
}

export function planLineFor(displayName: string): string {
  return `• Order ${displayName}`;
}
