/**
 * Centralized validation and sanitization utilities.
 *
 * Everything handed to git as an argument goes through here first so a
 * remote or reference can never be read as a command-line option.
 */
export class SecurityValidator {
  /**
   * Patterns that are never valid in a remote identifier
   */
  private static readonly DANGEROUS_REMOTE_PATTERNS = [
    /^-/,              // Option injection
    /[\x00-\x1f\x7f]/  // Control characters including null bytes
  ];

  /**
   * Patterns that are never valid in a reference
   */
  private static readonly DANGEROUS_REF_PATTERNS = [
    ...SecurityValidator.DANGEROUS_REMOTE_PATTERNS,
    /\s/               // Whitespace characters
  ];

  /**
   * Names that would put the deployment path on the destination or above it
   */
  private static readonly RESERVED_NAMES = ['', '.', '..'];

  /**
   * Validates a git reference (branch, tag, revision expression).
   *
   * Only blocks what would change how git parses its arguments; whether
   * the reference exists is left to git.
   *
   * @returns The reference unchanged
   * @throws {Error} When the reference is empty or contains dangerous patterns
   */
  static validateRef(ref: string): string {
    if (!ref) {
      throw new Error('Invalid reference: empty');
    }

    if (this.DANGEROUS_REF_PATTERNS.some(pattern => pattern.test(ref))) {
      throw new Error('Invalid reference: contains dangerous characters');
    }

    if (ref.length > 255) {
      throw new Error('Reference too long');
    }

    return ref;
  }

  /**
   * Validates a remote identifier in URL or scp-like syntax.
   *
   * Whitespace is allowed: git gets its arguments without a shell, and
   * local paths may contain spaces.
   *
   * @param remote - Remote locator as supplied by the caller
   * @param name - Repository name derived from the remote
   * @throws {Error} When the remote is empty, looks like an option or names no repository
   */
  static validateRemote(remote: string, name: string): string {
    if (!remote) {
      throw new Error('Invalid remote: empty');
    }

    if (this.DANGEROUS_REMOTE_PATTERNS.some(pattern => pattern.test(remote))) {
      throw new Error('Invalid remote: contains dangerous characters');
    }

    if (this.RESERVED_NAMES.includes(name)) {
      throw new Error('Invalid remote: does not name a repository');
    }

    return remote;
  }

  /**
   * Sanitizes error messages to prevent information disclosure.
   *
   * Removes file paths and IP addresses from error messages before
   * displaying them to users.
   */
  static sanitizeErrorMessage(error: unknown): string {
    if (!(error instanceof Error)) {
      return 'Unknown error';
    }

    return error.message
      .replace(/\/[^\s]+/g, '<path>') // Remove file paths
      .replace(/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, '<ip>') // Remove IP addresses
      .substring(0, 200);
  }
}

/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
