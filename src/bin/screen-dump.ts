#!/usr/bin/env node
import chalk from 'chalk';
import { ScreenBuffer } from '../screen/screen-buffer.js';
import { formatScreenDump } from '../screen/screen-dump.js';
import { standardColor, trueColor } from '../screen/screen-color.js';

type CliOptions = {
  cols: number;
  rows: number;
  color: boolean;
  text: string[];
};

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { cols: 40, rows: 10, color: true, text: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--cols') {
      options.cols = Number(argv[++i]);
    } else if (arg === '--rows') {
      options.rows = Number(argv[++i]);
    } else if (arg === '--plain') {
      options.color = false;
    } else {
      options.text.push(arg);
    }
  }
  return options;
}

function writeDemo(buffer: ScreenBuffer): void {
  buffer.setBold(true);
  buffer.setForeground(standardColor(2));
  buffer.writeText('tilescreen');
  buffer.resetAttributes();
  buffer.newline();
  buffer.setFlexWidthMode(true);
  buffer.writeText('wide: \u4e2d\u6587  combining: e\u0301');
  buffer.setFlexWidthMode(false);
  buffer.newline();
  buffer.setBackground(trueColor(40, 60, 120));
  buffer.writeText(' palette ');
  buffer.resetAttributes();
  buffer.newline();
  buffer.writeText('a long sentence that wraps at a word boundary when it reaches the edge');
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  const buffer = new ScreenBuffer({ cols: options.cols, rows: options.rows });

  if (options.text.length > 0) {
    options.text.forEach((line, i) => {
      if (i > 0) buffer.newline();
      buffer.writeText(line);
    });
  } else {
    writeDemo(buffer);
  }

  const { cols, rows } = buffer.getSize();
  console.log(chalk.gray(`${cols}x${rows}, scrollback ${buffer.getScrollbackSize()}`));
  for (const line of formatScreenDump(buffer, { color: options.color })) {
    console.log(line);
  }
}

main();
