import { houseTemplate } from "../templates/house.js";
import { shapesTemplate } from "../templates/shapes.js";

export const templates: Record<string, string> = {
  house: houseTemplate,
  shapes: shapesTemplate,
};

interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): void {
  const tmpl = templates[options.template];
  if (!tmpl) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    process.exit(1);
  }

  process.stdout.write(tmpl);
}
