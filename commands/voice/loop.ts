import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { parseLoopMode } from '../../utils/voiceManager';
import { LOOP_MODE_DISPLAY } from '../../components/buttons/music/controlButtons';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('loop')
    .setDescription('Set the loop mode, or cycle it when no mode is given')
    .addStringOption((option) =>
      option
        .setName('mode')
        .setDescription('Loop mode')
        .setRequired(false)
        .addChoices(
          { name: 'Off', value: 'off' },
          { name: 'Track', value: 'track' },
          { name: 'Queue', value: 'queue' }
        )
    ),
  async execute(voice, ctx, options) {
    const raw = options.getString('mode');
    const mode = raw === null ? null : parseLoopMode(raw);
    if (raw !== null && mode === null) return failure(`❌ Unknown loop mode "${raw}".`);

    try {
      const applied = mode ? await voice.setLoopMode(ctx.guildId, mode) : await voice.cycleLoopMode(ctx.guildId);
      const { emoji, label } = LOOP_MODE_DISPLAY[applied];
      return success(`${emoji} ${label}`);
    } catch (error) {
      return replyForError('loop', error);
    }
  },
};

export default command;
