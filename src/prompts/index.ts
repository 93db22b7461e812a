export { PROFILE_PROMPTS } from "./profile-prompt";
export { PROMPT_LOCALES, TAILORING_PROMPTS } from "./tailoring-prompt";

/**
 * Utility function to build prompts by replacing placeholders with actual values.
 * Placeholders without a matching variable are left as they are.
 * @param template The prompt template containing placeholders in {key} format.
 * @param variables An object mapping placeholder keys to their replacement values.
 * @returns The final prompt string with all placeholders replaced.
 */
export function buildPrompt(
  template: string,
  variables: Record<string, string>,
): string {
  return template
    .replace(/{(\w+)}/g, (match: string, key: string) =>
      Object.hasOwn(variables, key) ? variables[key] : match,
    )
    .trim();
}
