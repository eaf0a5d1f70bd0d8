#!/usr/bin/env node
/**
 * aenv - switch Anthropic API configs
 * Main entry point
 */
import { dispatch } from "./cli";
import { APP_NAME } from "./constants";
import { getErrorMessage } from "./errors";

dispatch(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error(`${APP_NAME}: ${getErrorMessage(err)}`);
        process.exitCode = 1;
    });
