import { DisplayableError } from "../utils/errors.js";

export class StyleSyntaxError extends DisplayableError {
  public readonly definition: string;

  constructor(definition: string, reason: string) {
    super(`Invalid style "${definition}": ${reason}.`, {
      hintLines: [
        'Combine attributes and colors, e.g. "bold red on white" or "not italic #ff8800".',
      ],
    });
    this.name = "StyleSyntaxError";
    this.definition = definition;
  }
}
