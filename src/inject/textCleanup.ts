/**
 * Text preparation before injection
 */

// Short hesitation sounds only; anything longer may be a real word
const FILLER_WORDS = ['uh', 'um', 'er', 'ah', 'eh', 'uhm', 'hmm', 'hm', 'mm'];

const FILLER_PATTERN = new RegExp(`\\b(${FILLER_WORDS.join('|')})\\b`, 'gi');
const JUST_ENTER_PATTERN = /^(.*?)\bjust\s+enter\b[.!\s]*$/is;

export interface PreparedText {
    text: string;
    pressEnter: boolean;
}

export interface PrepareOptions {
    cleanFillerWords: boolean;
}

/**
 * Remove filler words and repair the spacing and commas they leave behind.
 */
export function removeFillerWords(text: string): string {
    return text
        .replace(FILLER_PATTERN, '')
        .replace(/\s+/g, ' ')
        .replace(/\s*,\s*,\s*/g, ', ')
        .replace(/^[,\s]+/, '')
        .replace(/[,\s]+$/, '')
        .replace(/\s+([,.!?;:])/g, '$1')
        .trim();
}

/**
 * Returns what to type for one phrase, or null when nothing is left.
 * A phrase ending in "just enter" types what precedes it and presses Return.
 */
export function prepareText(raw: string, options: PrepareOptions): PreparedText | null {
    const text = options.cleanFillerWords ? removeFillerWords(raw) : raw.trim();
    if (!text) {
        return null;
    }

    const command = JUST_ENTER_PATTERN.exec(text);
    if (command) {
        return { text: command[1].trim(), pressEnter: true };
    }

    return { text: `${text} `, pressEnter: false };
}
