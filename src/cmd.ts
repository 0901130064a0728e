import './env.js';
import {
  ChannelType,
  Client,
  GatewayIntentBits,
  Partials,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type SlashCommandStringOption,
} from 'discord.js';
import { REST } from '@discordjs/rest';
import { Routes } from 'discord-api-types/v10';
import { createApp } from './app.js';
import {
  listSubscriptions,
  manualUpdate,
  matchList,
  MAX_LIST,
  resultList,
  setChannel,
  setLeadTime,
  subscribe,
  unsubscribe,
  type CommandDeps,
  type ListFilter,
} from './commands.js';
import { loadConfig } from './env.js';
import { StoreUnavailableError } from './errors.js';
import { MAX_LEAD_MINUTES, MIN_LEAD_MINUTES } from './guildConfig.js';
import { NonReentrant } from './lock.js';
import type { SubscriptionKind } from './types.js';

const config = loadConfig(process.env);

let deps: CommandDeps;
try {
  const app = createApp(config);
  const syncGuard = new NonReentrant('Poller');
  deps = {
    store: app.store,
    guilds: app.guilds,
    sync: async () => {
      const run = await syncGuard.run(app.sync);
      return run.ran
        ? run.value
        : { ok: false, inserted: 0, updated: 0, unchanged: 0, skipped: 0, pruned: 0, reason: 'an update is already running' };
    },
  };
} catch (err) {
  if (err instanceof StoreUnavailableError) {
    console.error(`[Cmd] ${err.message}`);
    process.exit(1);
  }
  throw err;
}

const client = new Client({
  intents: [GatewayIntentBits.Guilds],
  partials: [Partials.Channel]
});

const kindOption = (name: string) => (o: SlashCommandStringOption) => o
  .setName(name)
  .setDescription('Subscribe by team name or by event name')
  .setRequired(true)
  .addChoices({ name: 'team', value: 'team' }, { name: 'event', value: 'event_group' });

const commands = [
  new SlashCommandBuilder()
    .setName('vlr')
    .setDescription('VLR match notification settings')
    .addSubcommand(sc => sc
      .setName('channel')
      .setDescription('Set or clear the channel for match notifications')
      .addChannelOption(o => o.setName('channel').setDescription('Leave empty to clear').addChannelTypes(ChannelType.GuildText)))
    .addSubcommand(sc => sc
      .setName('leadtime')
      .setDescription('How many minutes before a match to notify')
      .addIntegerOption(o => o.setName('minutes').setDescription('Minutes').setRequired(true)
        .setMinValue(MIN_LEAD_MINUTES).setMaxValue(MAX_LEAD_MINUTES)))
    .addSubcommand(sc => sc
      .setName('subscribe')
      .setDescription('Subscribe this server to a team or event')
      .addStringOption(kindOption('kind'))
      .addStringOption(o => o.setName('name').setDescription('Exact team or event name').setRequired(true)))
    .addSubcommand(sc => sc
      .setName('unsubscribe')
      .setDescription('Unsubscribe this server from a team or event')
      .addStringOption(kindOption('kind'))
      .addStringOption(o => o.setName('name').setDescription('Exact team or event name').setRequired(true)))
    .addSubcommand(sc => sc
      .setName('subs')
      .setDescription('Show notification settings and subscriptions'))
    .addSubcommand(sc => sc
      .setName('update')
      .setDescription('Refresh matches from VLR now (does not send notifications)'))
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
    .toJSON(),
  new SlashCommandBuilder()
    .setName('vlrinfo')
    .setDescription('Valorant esports matches and results')
    .addSubcommand(sc => sc
      .setName('matches')
      .setDescription('Upcoming matches')
      .addIntegerOption(o => o.setName('count').setDescription(`Up to ${MAX_LIST}`).setMinValue(1).setMaxValue(MAX_LIST))
      .addStringOption(o => o.setName('filter').setDescription('Competition filter')
        .addChoices({ name: 'all', value: 'all' }, { name: 'VCT', value: 'vct' }, { name: 'Game Changers', value: 'gc' })))
    .addSubcommand(sc => sc
      .setName('results')
      .setDescription('Completed matches')
      .addIntegerOption(o => o.setName('count').setDescription(`Up to ${MAX_LIST}`).setMinValue(1).setMaxValue(MAX_LIST))
      .addStringOption(o => o.setName('filter').setDescription('Competition filter')
        .addChoices({ name: 'all', value: 'all' }, { name: 'VCT', value: 'vct' }, { name: 'Game Changers', value: 'gc' })))
    .toJSON(),
];

async function registerCommands() {
  if (!config.discordToken || !config.appId) {
    console.warn('[Cmd] Skipping command registration: missing DISCORD_TOKEN or APP_ID');
    return;
  }

  const rest = new REST({ version: '10' }).setToken(config.discordToken);

  if (config.guildIds.length > 0) {
    for (const gid of config.guildIds) {
      await rest.put(Routes.applicationGuildCommands(config.appId, gid), { body: commands });
      console.log(`[Cmd] Registered ${commands.length} command set(s) for guild ${gid}`);
    }
  } else {
    await rest.put(Routes.applicationCommands(config.appId), { body: commands });
    console.log(`[Cmd] Registered ${commands.length} command set(s) globally`);
  }
}

const toKind = (v: string): SubscriptionKind => (v === 'team' ? 'team' : 'event_group');
const toFilter = (v: string | null): ListFilter => (v === 'vct' || v === 'gc' ? v : 'all');

async function handleSettings(interaction: ChatInputCommandInteraction, guildId: string) {
  const sub = interaction.options.getSubcommand();
  if (sub === 'channel') {
    const channel = interaction.options.getChannel('channel');
    await interaction.reply({ content: setChannel(deps, guildId, channel?.id ?? null), ephemeral: true });
    return;
  }
  if (sub === 'leadtime') {
    const minutes = interaction.options.getInteger('minutes', true);
    await interaction.reply({ content: setLeadTime(deps, guildId, minutes), ephemeral: true });
    return;
  }
  if (sub === 'subscribe' || sub === 'unsubscribe') {
    const kind = toKind(interaction.options.getString('kind', true));
    const name = interaction.options.getString('name', true);
    const content = sub === 'subscribe' ? subscribe(deps, guildId, kind, name) : unsubscribe(deps, guildId, kind, name);
    await interaction.reply({ content, ephemeral: true });
    return;
  }
  if (sub === 'subs') {
    await interaction.reply({ content: listSubscriptions(deps, guildId), ephemeral: true });
    return;
  }
  if (sub === 'update') {
    await interaction.deferReply({ ephemeral: true });
    await interaction.editReply({ content: await manualUpdate(deps) });
  }
}

async function handleInfo(interaction: ChatInputCommandInteraction) {
  const sub = interaction.options.getSubcommand();
  const req = {
    count: interaction.options.getInteger('count') ?? undefined,
    filter: toFilter(interaction.options.getString('filter')),
  };
  await interaction.deferReply();
  const embed = sub === 'results' ? await resultList(deps, req) : await matchList(deps, req);
  await interaction.editReply({ embeds: [embed] });
}

client.on('ready', () => {
  console.log(`[Cmd] Command bot logged in as ${client.user?.tag}`);
});

client.on('interactionCreate', async (interaction) => {
  if (!interaction.isChatInputCommand()) return;
  try {
    if (interaction.commandName === 'vlr') {
      if (!interaction.inGuild()) {
        await interaction.reply({ content: 'This command only works in a server.', ephemeral: true });
        return;
      }
      await handleSettings(interaction, interaction.guildId);
    } else if (interaction.commandName === 'vlrinfo') {
      await handleInfo(interaction);
    }
  } catch (err) {
    console.error(`[Cmd] Error handling /${interaction.commandName}`, err);
    const content = 'Something went wrong handling that command.';
    const report: Promise<unknown> = interaction.deferred || interaction.replied
      ? interaction.editReply({ content })
      : interaction.reply({ content, ephemeral: true });
    await report.catch(replyErr => console.error('[Cmd] Failed to report error to user', replyErr));
  }
});

async function main() {
  await registerCommands();
  if (config.discordToken) await client.login(config.discordToken);
  else console.warn('[Cmd] DISCORD_TOKEN not set; command bot will not connect.');
}

main().catch(err => {
  console.error('[Cmd] Startup failed', err);
  process.exitCode = 1;
});
