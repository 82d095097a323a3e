export const EOL = '\n';
export const DOUBLE_EOL = EOL + EOL;
export const INDENT = ' '.repeat(2);

// Node names, application ids and agent names all share this shape
export const KEBAB_CASE_PATTERN = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;
