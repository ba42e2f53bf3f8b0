import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('ignorepick')}${dimText(': interactive .gitignore generator')}`
    : 'ignorepick: interactive .gitignore generator';

  const lines = [
    title,
    '',
    'Usage: ignorepick [--cache-dir <dir>] [command] [options]',
    '',
    formatSection('Commands', [
      ['generate', 'Pick templates interactively and write a .gitignore (default)'],
      ['list', 'List cached templates'],
      ['update', 'Download the latest templates into the cache'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global flags', [
      ['--cache-dir, -c <dir>', 'Template cache directory (default: ~/.cache/ignorepick)'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Picker keys', [
      ['Space', 'Toggle the template under the cursor'],
      ['Arrows / h j k l', 'Move'],
      ['PgUp / PgDn, Home / End', 'Scroll a page, jump to first / last'],
      ['/ or any other letter', 'Filter by name (Enter keeps the filter, Esc clears it)'],
      ['Ctrl+A / Ctrl+U', 'Select / clear everything shown'],
      ['Enter', 'Write the .gitignore'],
      ['Esc / q', 'Quit without writing'],
    ]),
    '',
    formatSection('Config', [
      ['ignorepick.json', 'Selected templates and custom templates, next to your project'],
    ]),
    '',
    dimText('Run `ignorepick <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

export function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
