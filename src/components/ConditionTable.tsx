import chalk from 'chalk';
import {Box, Text} from 'ink';
import React from 'react';
import type {Condition} from '../types/domain';
import {colorFor, conditionLines, isNegativeCondition} from '../utils/formatters';
import {formatTable} from '../utils/table';

function paint(status: string, type: string): string {
  const {color, dimColor} = colorFor(status, isNegativeCondition(type));
  if (dimColor) return chalk.dim(status);
  return color ? chalk[color](status) : status;
}

export function conditionRows(conditions: readonly Condition[]): string[][] {
  const rows: string[][] = [['CONDITION', 'STATUS', 'MESSAGE']];
  for (const c of conditions) {
    const [first, ...rest] = conditionLines(c);
    rows.push([c.type, paint(c.status, c.type), first]);
    // continuation lines sit under MESSAGE
    for (const line of rest) rows.push(['', '', line]);
  }
  return rows;
}

export const ConditionTable: React.FC<{conditions: readonly Condition[]}> = ({conditions}) => (
  <Box flexDirection="column">
    {formatTable(conditionRows(conditions)).map((line, i) => (
      <Text key={i}>{line}</Text>
    ))}
  </Box>
);
