#!/usr/bin/env node
/**
 * Counter example: keys change the count, a ticking clock runs beside it
 */

import chalk from 'chalk';
import {
  Program,
  batch,
  quit,
  tick,
  getErrorMessage,
  type Cmd,
  type Init,
  type KeyMsg,
  type Update,
  type View
} from '../src/index.js';

// Define the model (application state)
interface Model {
  count: number;
  now: Date | null;
}

// Define messages (events)
type Msg = KeyMsg | { type: 'tick'; time: Date };

const clock = (): Cmd<Msg> => tick<Msg>(1000, (time) => ({ type: 'tick', time }));

const now: Cmd<Msg> = () => ({ type: 'tick', time: new Date() });

// Show the time right away, then keep ticking
const init: Init<Model, Msg> = () => [{ count: 0, now: null }, batch(now, clock())];

const update: Update<Model, Msg> = (model, msg) => {
  switch (msg.type) {
    case 'tick':
      return [{ ...model, now: msg.time }, clock()];

    case 'key':
      if (msg.key === 'q' || (msg.key === 'c' && msg.ctrl)) {
        return [model, quit];
      }
      if (msg.key === '+' || msg.key === '=') {
        return [{ ...model, count: model.count + 1 }];
      }
      if (msg.key === '-' || msg.key === '_') {
        return [{ ...model, count: model.count - 1 }];
      }
      if (msg.key === 'r') {
        return [{ ...model, count: 0 }];
      }
      return [model];
  }
};

const view: View<Model> = (model) => {
  const time = model.now ? model.now.toLocaleTimeString() : '--:--:--';
  return [
    chalk.bold('Counter Example'),
    '',
    `  Count: ${chalk.cyan(model.count.toString().padStart(4))}`,
    `  Time:  ${chalk.dim(time)}`,
    '',
    chalk.gray('  +/= increment   -/_ decrement   r reset   q quit')
  ].join('\n');
};

const program = new Program(init, update, view);

program.start().then(
  () => process.stdout.write('\n'),
  (error: unknown) => {
    process.stderr.write(`counter: ${getErrorMessage(error)}\n`);
    process.exitCode = 1;
  }
);
