import { Command } from "commander";
import { fontsListCommand, fontsMatchCommand } from "./commands/fonts.js";
import { initCommand } from "./commands/init.js";
import { renderCommand } from "./commands/render.js";
import { validateCommand } from "./commands/validate.js";

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();

program
  .name("brushwork")
  .description("Render drawing scripts to SVG through the generic drawing interface")
  .version("0.1.0");

program
  .command("render <input>")
  .description("Render a YAML/JSON drawing script to SVG")
  .option("-o, --output <file>", "Output file path (default: <input>.svg)")
  .action(renderCommand);

program
  .command("validate <input>")
  .description("Check a drawing script for errors without rendering it")
  .action(validateCommand);

program
  .command("init")
  .description("Print a template drawing script")
  .option("-t, --template <name>", "Template name (house, shapes)", "house")
  .action(initCommand);

const fonts = program.command("fonts").description("Inspect font sources");

fonts
  .command("list")
  .description("List font families found in system and extra directories")
  .option("-d, --dir <path>", "Extra font directory (repeatable)", collect, [])
  .option("--no-system", "Skip system font directories")
  .action(fontsListCommand);

fonts
  .command("match <family...>")
  .description("Show the face that best matches the given families and properties")
  .option("-w, --weight <n>", "CSS font weight")
  .option("-s, --style <style>", "normal, italic or oblique")
  .option("-d, --dir <path>", "Extra font directory (repeatable)", collect, [])
  .option("--no-system", "Skip system font directories")
  .action(fontsMatchCommand);

await program.parseAsync();
