/**
 * Short name of a shrinker identifier: its innermost name component.
 *
 *   "Shorty"                      -> "Shorty"
 *   "LinkShrink::Shrinkers::Isgd" -> "Isgd"
 *   "shrinkers.TinyUrl"           -> "TinyUrl"
 */

const NAMESPACE_SEPARATOR = /::|[./\\]/;

export function deriveShortName(identifier: string): string {
  const components = identifier
    .trim()
    .split(NAMESPACE_SEPARATOR)
    .filter((component) => component.length > 0);

  return components[components.length - 1] ?? "";
}
