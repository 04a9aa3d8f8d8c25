/** Style definitions every theme starts from unless it opts out of inheriting. */
export const DEFAULT_STYLES: Readonly<Record<string, string>> = Object.freeze({
  none: "none",
  bold: "bold",
  dim: "dim",
  italic: "italic",
  underline: "underline",
  strike: "strike",
  reverse: "reverse",
  info: "cyan",
  warning: "bold yellow",
  error: "bold red",
  success: "bold green",
  "repr.number": "bold cyan",
  "repr.str": "green",
  "repr.bool_true": "italic bright_green",
  "repr.bool_false": "italic bright_red",
  "repr.url": "underline bright_blue",
});
