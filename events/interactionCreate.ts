import { Events, MessageFlags, type Interaction } from 'discord.js';
import { findCommand } from '../commands';
import { handleButtonInteraction } from '../handlers/buttonHandler';
import { handleModalSubmit, handleSelectMenuInteraction } from '../handlers/selectMenuHandler';
import { createLogger } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';
import type { VoiceManager } from '../utils/voiceManager';
import type { NowPlayingPanel } from '../utils/nowPlayingPanel';

const log = createLogger('INTERACTION');

export interface InteractionDeps {
  voice: VoiceManager;
  panel: NowPlayingPanel;
}

export default {
  name: Events.InteractionCreate as const,
  async execute(interaction: Interaction, deps: InteractionDeps): Promise<void> {
    if (interaction.isButton() || interaction.isStringSelectMenu() || interaction.isModalSubmit()) {
      const memberChannel = interaction.inCachedGuild() ? interaction.member.voice.channelId : null;
      const result = interaction.isButton()
        ? await handleButtonInteraction(interaction, memberChannel)
        : interaction.isStringSelectMenu()
          ? await handleSelectMenuInteraction(interaction, memberChannel)
          : await handleModalSubmit(interaction, memberChannel);
      if (!result.success) log.debug(`Component ${interaction.customId} rejected: ${result.error}`);
      return;
    }

    if (!interaction.isChatInputCommand() || !interaction.inCachedGuild()) return;

    const command = findCommand(interaction.commandName);
    if (!command) {
      log.warn(`Unknown command: ${interaction.commandName}`);
      return;
    }

    log.info(`/${interaction.commandName} by ${interaction.user.tag} in guild ${interaction.guildId}`);

    try {
      if (command.defer) await interaction.deferReply();

      const { panel, ephemeral, ...payload } = await command.execute(
        deps.voice,
        {
          guildId: interaction.guildId,
          userId: interaction.user.id,
          voiceChannelId: interaction.member.voice.channelId,
        },
        interaction.options
      );

      if (interaction.deferred) {
        if (ephemeral) {
          await interaction.deleteReply();
          await interaction.followUp({ ...payload, flags: MessageFlags.Ephemeral });
          return;
        }
        const message = await interaction.editReply(payload);
        if (panel) deps.panel.attach(interaction.guildId, message);
        return;
      }

      await interaction.reply(ephemeral ? { ...payload, flags: MessageFlags.Ephemeral } : payload);
      if (panel) deps.panel.attach(interaction.guildId, await interaction.fetchReply());
    } catch (error) {
      log.error(`Error executing /${interaction.commandName}: ${toErrorMessage(error)}`, {
        stack: error instanceof Error ? error.stack : undefined,
      });
      const content = '❌ There was an error while executing this command.';
      try {
        if (interaction.deferred || interaction.replied) {
          await interaction.followUp({ content, flags: MessageFlags.Ephemeral });
        } else {
          await interaction.reply({ content, flags: MessageFlags.Ephemeral });
        }
      } catch (replyError) {
        log.warn(`Could not send error reply: ${toErrorMessage(replyError)}`);
      }
    }
  },
};
