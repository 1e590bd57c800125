#!/usr/bin/env node
import path from 'path';
import chalk from 'chalk';
import { createTranslator } from './translator.js';
import { evaluate } from './evaluator/index.js';
import { parse } from './parser/index.js';
import { expressionToString } from './utils/ast/printer.js';
import { loadLocaleFile } from './locale/loader.js';
import { collectConditions, parseConditionTemplate, parseParamValue } from './utils/conditions.js';
import { I18nException, describeError } from './types/errors.js';
import type { ParameterValue } from './types/index.js';

const VERSION = '0.3.0';
const HELP = `
conditional-i18n v${VERSION}

Usage:
  conditional-i18n get <file> <key>    Resolve a key from a JSON/YAML/TOML locale file
  conditional-i18n eval <expression>   Evaluate a condition to true/false
  conditional-i18n validate <file>     Check every condition key in a locale file

Options:
  --locale=<id>        Locale id for 'get' (default: file name without extension)
  --param name=value   Parameter for 'get', repeatable
  --explain            For 'eval', print the condition as parsed before the result
  --help, -h           Show this help
  --version, -v        Show version

Examples:
  conditional-i18n get locales/en.json cart.items --param count=3
  conditional-i18n eval "2 > 1 and 'a' < 'b'"
  conditional-i18n validate locales/fr.yaml
`;

const args = process.argv.slice(2);

let locale: string | undefined;
let explain = false;
const params: Record<string, ParameterValue> = {};
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--locale=')) {
        locale = arg.slice('--locale='.length);
    } else if (arg === '--locale') {
        if (i + 1 < args.length) {
            locale = args[++i];
        }
    } else if (arg === '--explain') {
        explain = true;
    } else if (arg.startsWith('--param=') || arg === '--param') {
        const pair = arg === '--param' ? args[++i] ?? '' : arg.slice('--param='.length);
        addParam(pair);
    } else if (!arg.startsWith('-') || /^-[\d.]/.test(arg)) {
        cleanArgs.push(arg);
    }
}

const commandName = cleanArgs[0];

function addParam(pair: string): void {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
        console.error(`Error: --param expects name=value, got '${pair}'`);
        process.exit(1);
    }
    params[pair.slice(0, eq)] = parseParamValue(pair.slice(eq + 1));
}

async function main() {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    switch (commandName) {
        case 'eval': {
            const expression = cleanArgs.slice(1).join(' ');
            if (!expression) {
                console.error('Error: expression argument required');
                process.exit(1);
            }
            if (explain) {
                try {
                    console.log(chalk.dim(expressionToString(parse(expression).body)));
                } catch (e) {
                    console.log(chalk.dim(describeError(e)));
                }
            }
            console.log(evaluate(expression) ? 'true' : 'false');
            break;
        }
        case 'get': {
            const [, fileName, key] = cleanArgs;
            if (!fileName || !key) {
                console.error('Error: file and key arguments required');
                process.exit(1);
            }
            const id = locale ?? path.basename(fileName, path.extname(fileName));
            const translator = await createTranslator({
                defaultLocale: id,
                locales: fileName,
                logger: { warn: message => console.error(chalk.yellow(message)) },
            });
            console.log(translator.get(key, id, params));
            break;
        }
        case 'validate': {
            const fileName = cleanArgs[1];
            if (!fileName) {
                console.error('Error: file argument required');
                process.exit(1);
            }
            const tree = await loadLocaleFile(fileName);
            let allValid = true;
            for (const { path: keyPath, condition } of collectConditions(tree)) {
                const where = keyPath ? chalk.dim(`${keyPath}: `) : '';
                try {
                    parseConditionTemplate(condition);
                    console.log(`${chalk.green('✓')} ${where}${condition}`);
                } catch (e) {
                    allValid = false;
                    console.log(`${chalk.red('✗')} ${where}${condition}`);
                    console.log(`  Error: ${describeError(e)}`);
                    if (e instanceof I18nException && e.error.suggestion) {
                        console.log(`  Suggestion: ${e.error.suggestion}`);
                    }
                }
            }
            process.exit(allValid ? 0 : 1);
            break;
        }
        default:
            console.error(`Unknown command: ${commandName}`);
            console.log(HELP);
            process.exit(1);
    }
}

main().catch(e => {
    console.error(chalk.red(`Error: ${describeError(e)}`));
    process.exit(1);
});
