import { SourceRole } from './types';

/**
 * Raised when a source table does not have the shape of a plant export:
 * missing sheet, missing header row, or too few columns.
 *
 * Fatal for the file it concerns. `sourceId` is filled in by whoever
 * knows the file identity (the loader itself only sees a table).
 */
export class MalformedInputError extends Error {
  constructor(
    public readonly reason: string,
    public readonly role?: SourceRole,
    public readonly sourceId?: string,
  ) {
    super(MalformedInputError.format(reason, role, sourceId));
    this.name = 'MalformedInputError';
  }

  /**
   * Copy of this error tagged with a file identity.
   */
  withSource(sourceId: string, role?: SourceRole): MalformedInputError {
    return new MalformedInputError(this.reason, role ?? this.role, sourceId);
  }

  private static format(
    reason: string,
    role?: SourceRole,
    sourceId?: string,
  ): string {
    const context = [sourceId, role].filter(Boolean).join(', ');
    return context ? `[${context}] ${reason}` : reason;
  }
}
