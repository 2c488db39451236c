import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { Report, evalCommand, graphCommand, rpnCommand } from "./commands.js";
import { defaultAxes } from "./graph.js";
import { getLogLevel, levels, log, setLogLevel } from "./log.js";

const report = (r: Report) => {
  if (r.ok) for (const line of r.lines) console.log(line);
  else {
    log.error(r.error);
    process.exitCode = 1;
  }
};

yargs(hideBin(process.argv))
  .scriptName("xcalc")
  .option("log-level", {
    choices: levels,
    default: getLogLevel(),
    describe: "verbosity of messages on stderr",
  })
  .middleware((argv) => setLogLevel(argv["log-level"]))
  .command(
    "eval <expression>",
    "evaluate an expression",
    (yargs) =>
      yargs
        .positional("expression", { type: "string", demandOption: true })
        .option("x", { type: "string", default: "0" }),
    ({ expression, x }) => report(evalCommand(expression, x)),
  )
  .command(
    "rpn <expression>",
    "print an expression in postfix order",
    (yargs) =>
      yargs
        .positional("expression", { type: "string", demandOption: true })
        .option("x", { type: "string", default: "0" }),
    ({ expression, x }) => report(rpnCommand(expression, x)),
  )
  .command(
    "graph <expression>",
    "print the points of y = expression",
    (yargs) =>
      yargs
        .positional("expression", { type: "string", demandOption: true })
        .option("x-min", { type: "string", default: `${defaultAxes.xMin}` })
        .option("x-max", { type: "string", default: `${defaultAxes.xMax}` })
        .option("y-min", { type: "string", default: `${defaultAxes.yMin}` })
        .option("y-max", { type: "string", default: `${defaultAxes.yMax}` }),
    (argv) =>
      report(
        graphCommand(argv.expression, {
          xMin: argv["x-min"],
          xMax: argv["x-max"],
          yMin: argv["y-min"],
          yMax: argv["y-max"],
        }),
      ),
  )
  .demandCommand()
  .strict()
  .help()
  .parseSync();
