/**
 * Output sinks for a finished bundle: prompt template, file, clipboard.
 */

import { readFileSync, writeFileSync } from 'fs';
import clipboard from 'clipboardy';
import { OutputError, errorMessage } from '../errors.js';

/** Placeholder a prompt template must contain; every occurrence receives the bundle. */
export const TEMPLATE_MARKER = '${${CONTENT}$}$';

export function applyTemplate(template: string, content: string): string {
    if (!template.includes(TEMPLATE_MARKER)) {
        throw new OutputError(`Template does not contain the placeholder ${TEMPLATE_MARKER}`);
    }
    // split/join so "$" sequences in the content are not treated as replacement patterns
    return template.split(TEMPLATE_MARKER).join(content);
}

export function loadTemplate(templatePath: string): string {
    try {
        return readFileSync(templatePath, 'utf-8');
    } catch (error) {
        throw new OutputError(`Failed to read template ${templatePath}: ${errorMessage(error)}`, { cause: error });
    }
}

export function writeOutput(outputPath: string, content: string): void {
    try {
        writeFileSync(outputPath, content, 'utf-8');
    } catch (error) {
        throw new OutputError(`Failed to write ${outputPath}: ${errorMessage(error)}`, { cause: error });
    }
}

export function copyToClipboard(content: string): void {
    try {
        clipboard.writeSync(content);
    } catch (error) {
        throw new OutputError(`Failed to copy to clipboard: ${errorMessage(error)}`, { cause: error });
    }
}
