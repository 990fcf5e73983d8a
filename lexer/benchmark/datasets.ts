/**
 * Synthetic Markdown documents for the benchmark, generated to a target size.
 */

export interface BenchmarkDataset {
  name: string;
  description: string;
  content: string;
  characteristics: string[];
}

const SIMPLE_PATTERNS = [
  '# Release notes\n',
  '\n',
  'The importer now keeps **file order** and reports *skipped rows*.\n',
  '## Changes\n',
  '- Faster `csv` reader\n',
  '- Retry on [timeouts](https://example.com/retry "retry policy")\n',
  '+ Quieter logs\n',
  '\n',
];

const MIXED_PATTERNS = [
  '### Setup\n',
  '1. Install the tool\n',
  '2. Copy `config.sample` to `config`\n',
  '> Keep the ***staging*** credentials out of version control.\n',
  '```shell\n',
  '    run --dry\n',
  '```\n',
  '---\n',
  'Questions go to <support@example.com> or <https://example.com/help>.\n',
  'See the [guide][setup] and ![diagram](images/flow.png "data flow").  \n',
  '[setup]: https://example.com/setup "Setup guide"\n',
  '\n',
];

const TEXT_BLOCK =
  'The queue drains in batches of a fixed size, and each batch is written ' +
  'to the store before the next one is read. When a write fails the batch ' +
  'is retried with a growing delay, and after the last attempt the rows are ' +
  'moved aside for a person to inspect later in the day.\n\n';

const FORMATTING_PATTERNS = [
  'Mix of **bold**, *italic*, ***both*** and `code` on one line.\n',
  'Underscores work too: __strong__ and _soft_ and ___loud___.\n',
  'Unmatched *star and **double star stay as text.\n',
  'Long runs ****like this**** and escaped \\*stars\\* too.\n',
  'Code with ``double ticks`` and a trailing break<br>\n',
];

function repeatToSize(patterns: readonly string[], targetSize: number, header = ''): string {
  let content = header;
  let index = 0;
  while (content.length < targetSize) {
    content += patterns[index % patterns.length];
    index++;
  }
  return content.substring(0, targetSize);
}

export function generateSimpleDocument(targetSize: number): string {
  return repeatToSize(SIMPLE_PATTERNS, targetSize);
}

export function generateMixedDocument(targetSize: number): string {
  return repeatToSize(MIXED_PATTERNS, targetSize);
}

export function generateTextHeavyDocument(targetSize: number): string {
  return repeatToSize([TEXT_BLOCK], targetSize, '# Operations log\n\n');
}

export function generateFormattingHeavyDocument(targetSize: number): string {
  return repeatToSize(FORMATTING_PATTERNS, targetSize, '# Formatting\n\n');
}

/**
 * Every dataset at its default size; `scale` multiplies all sizes.
 */
export function generateDatasets(scale = 1): BenchmarkDataset[] {
  const kb = (n: number) => Math.max(1, Math.round(n * 1024 * scale));
  return [
    {
      name: 'small-simple',
      description: 'Headings, short paragraphs and lists',
      content: generateSimpleDocument(kb(1)),
      characteristics: ['headers', 'paragraphs', 'basic-emphasis'],
    },
    {
      name: 'medium-mixed',
      description: 'Every block mark and link form',
      content: generateMixedDocument(kb(50)),
      characteristics: ['lists', 'quotes', 'links', 'autolinks', 'definitions'],
    },
    {
      name: 'large-text-heavy',
      description: 'Long paragraphs with almost no markup',
      content: generateTextHeavyDocument(kb(500)),
      characteristics: ['long-paragraphs', 'minimal-formatting'],
    },
    {
      name: 'complex-formatting',
      description: 'Dense emphasis, code spans and escapes',
      content: generateFormattingHeavyDocument(kb(100)),
      characteristics: ['emphasis-runs', 'inline-code', 'escapes'],
    },
  ];
}
