/**
 * Environment detection utilities.
 *
 * Used to decide whether the CLI may stop and ask the user for input.
 */
export class EnvironmentUtils {
  /**
   * Checks if the application is running in a CI/CD environment.
   *
   * @returns true if running in CI/CD, false otherwise
   */
  static isCiEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
    return (
      !!env.CI ||
      !!env.GITHUB_ACTIONS ||
      !!env.GITLAB_CI ||
      !!env.CIRCLECI ||
      !!env.JENKINS_URL ||
      !!env.TRAVIS
    );
  }

  /**
   * Checks whether prompts can be shown: a TTY on stdin and not CI.
   */
  static isInteractive(env: NodeJS.ProcessEnv = process.env): boolean {
    return !this.isCiEnvironment(env) && process.stdin.isTTY === true;
  }
}
