import type { SlashCommand } from '../types/commands';
import play from './voice/play';
import skip from './voice/skip';
import pause from './voice/pause';
import resume from './voice/resume';
import stop from './voice/stop';
import leave from './voice/leave';
import loop from './voice/loop';
import vol from './voice/vol';
import queue from './voice/queue';
import np from './voice/np';
import shuffle from './voice/shuffle';
import jump from './voice/jump';
import remove from './voice/remove';
import clear from './voice/clear';

export const commands: readonly SlashCommand[] = [
  play,
  skip,
  pause,
  resume,
  stop,
  leave,
  loop,
  vol,
  queue,
  np,
  shuffle,
  jump,
  remove,
  clear,
];

export function findCommand(name: string): SlashCommand | undefined {
  return commands.find((command) => command.data.name === name);
}
