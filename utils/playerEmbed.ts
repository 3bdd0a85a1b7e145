// util-category: discord
import { EmbedBuilder, ActionRowBuilder, ButtonBuilder, StringSelectMenuBuilder } from 'discord.js';
import {
  LOOP_MODE_DISPLAY,
  createMusicControlRow,
  createPanelRow,
} from '../components/buttons/music/controlButtons';
import { createJumpMenu } from '../components/select-menus/string/jumpMenu';
import { extractYouTubeVideoId } from './voice/trackMetadata';
import { QUEUE_PREVIEW_SIZE, MAX_LIST_OPTIONS } from './voice/constants';
import type { SessionSnapshot, Track } from '../types/voice';

/* ============================================================================
 * FORMATTERS
 * ============================================================================
 */

/**
 * Format duration in seconds to MM:SS or HH:MM:SS
 */
export function formatDuration(seconds: number | null | undefined): string | null {
  if (!seconds || seconds <= 0 || Number.isNaN(seconds)) return null;

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  }

  return `${minutes}:${secs.toString().padStart(2, '0')}`;
}

/**
 * Track artwork, falling back to the YouTube thumbnail for video URLs
 */
export function getThumbnail(track: Track | null): string | null {
  if (!track) return null;
  if (track.thumbnail) return track.thumbnail;
  const id = extractYouTubeVideoId(track.url);
  return id ? `https://img.youtube.com/vi/${id}/hqdefault.jpg` : null;
}

/**
 * Text progress bar, e.g. █████░░░░░░░░░░░░░░░
 */
export function createProgressBar(position: number, duration: number, width: number = 20): string {
  if (duration <= 0) return '—'.repeat(width);
  const fraction = Math.min(1, Math.max(0, position / duration));
  const filled = Math.round(fraction * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function formatQueueLine(track: Track, index: number): string {
  const number = (index + 1).toString().padStart(2, '0');
  const duration = formatDuration(track.duration);
  return `\`${number}\` ${track.title}${duration ? ` \`${duration}\`` : ''}`;
}

/* ============================================================================
 * PLAYER STATE DERIVATION
 * ============================================================================
 */

interface DerivedPlayerState {
  title: string;
  description: string;
  color: number;
  footer: string;
  thumbnail: string | null;
  requester: string | null;
}

function derivePlayerState(snapshot: SessionSnapshot, notice?: string): DerivedPlayerState {
  const track = snapshot.currentTrack;
  const { status } = snapshot;

  /* ---------- COLOR + TITLE ---------- */
  let color = 0x6366f1; // Blue
  let title = '🎵 Now Playing';
  if (status === 'paused') {
    color = 0xf59e0b; // Orange
    title = '⏸️ Paused';
  } else if (status === 'buffering') {
    title = '⏳ Loading';
  } else if (status === 'stopped') {
    color = 0x6b7280; // Gray
    title = '⏹️ Stopped';
  } else if (!track) {
    color = 0x6b7280;
    title = '💤 Idle';
  }

  /* ---------- DESCRIPTION ---------- */
  let description = track ? `**${track.title}**` : '*Nothing playing*';
  const total = formatDuration(track?.duration);
  if (total) {
    const current = formatDuration(snapshot.position) ?? '0:00';
    description += `\n${createProgressBar(snapshot.position, track?.duration ?? 0)}`;
    description += `\n\`${current} / ${total}\``;
  }
  if (notice) {
    description += `\n\n⚠️ ${notice}`;
  }

  /* ---------- FOOTER ---------- */
  const loop = LOOP_MODE_DISPLAY[snapshot.loopMode];
  const footer = `${loop.emoji} ${loop.label} • 🔊 ${Math.round(snapshot.effectiveGain * 100)}%`;

  return {
    title,
    description,
    color,
    footer,
    thumbnail: getThumbnail(track),
    // Mentions only render outside the footer
    requester: track ? `<@${track.requestedBy}>` : null,
  };
}

/* ============================================================================
 * EMBEDS
 * ============================================================================
 */

export function createPlayerEmbed(snapshot: SessionSnapshot, notice?: string): EmbedBuilder {
  const derived = derivePlayerState(snapshot, notice);

  const embed = new EmbedBuilder()
    .setColor(derived.color)
    .setTitle(derived.title)
    .setDescription(derived.description)
    .setFooter({ text: derived.footer });

  if (derived.thumbnail) {
    embed.setThumbnail(derived.thumbnail);
  }

  if (derived.requester) {
    embed.addFields({ name: 'Requested by', value: `👤 ${derived.requester}`, inline: true });
  }

  /* ---------- QUEUE PREVIEW ---------- */
  const { queue } = snapshot;
  if (queue.length > 0) {
    const preview = queue.slice(0, QUEUE_PREVIEW_SIZE).map(formatQueueLine).join('\n');
    const overflow =
      queue.length > QUEUE_PREVIEW_SIZE ? `\n*...and ${queue.length - QUEUE_PREVIEW_SIZE} more*` : '';

    embed.addFields({
      name: `📋 Up Next — ${queue.length} track${queue.length === 1 ? '' : 's'}`,
      value: preview + overflow,
      inline: false,
    });
  } else if (snapshot.status !== 'stopped') {
    embed.addFields({ name: '📋 Up Next', value: '*Queue is empty*', inline: false });
  }

  return embed;
}

/**
 * Full queue listing (first page)
 */
export function createQueueEmbed(snapshot: SessionSnapshot): EmbedBuilder {
  const { queue, currentTrack } = snapshot;
  const lines = queue.slice(0, MAX_LIST_OPTIONS).map(formatQueueLine);
  if (queue.length > MAX_LIST_OPTIONS) {
    lines.push(`*...and ${queue.length - MAX_LIST_OPTIONS} more*`);
  }

  const totalSeconds = queue.reduce((sum, track) => sum + track.duration, 0);
  const totalText = formatDuration(totalSeconds);

  return new EmbedBuilder()
    .setColor(0x6366f1)
    .setTitle('📋 Queue')
    .setDescription(
      `${currentTrack ? `▶️ **${currentTrack.title}**` : '*Nothing playing*'}\n\n` +
        (lines.length > 0 ? lines.join('\n') : '*Queue is empty*')
    )
    .setFooter({
      text: `${queue.length} track${queue.length === 1 ? '' : 's'}${totalText ? ` • ${totalText}` : ''}`,
    });
}

/* ============================================================================
 * PUBLIC MESSAGE FACTORY
 * ============================================================================
 */

export type PlayerRow = ActionRowBuilder<ButtonBuilder> | ActionRowBuilder<StringSelectMenuBuilder>;

export interface PlayerMessage {
  embeds: EmbedBuilder[];
  components: PlayerRow[];
}

export function createPlayerMessage(snapshot: SessionSnapshot, notice?: string): PlayerMessage {
  const embeds = [createPlayerEmbed(snapshot, notice)];
  if (snapshot.status === 'stopped') return { embeds, components: [] };

  const components: PlayerRow[] = [
    createMusicControlRow({
      isPaused: snapshot.status === 'paused',
      canSkip: snapshot.currentTrack !== null || snapshot.queue.length > 0,
      canShuffle: snapshot.queue.length > 1,
      loopMode: snapshot.loopMode,
    }),
    createPanelRow(),
  ];
  const jump = createJumpMenu(snapshot.queue);
  if (jump) components.push(jump);
  return { embeds, components };
}
