import { describe, it, expect } from 'vitest';
import { ApplicationCommandOptionType, ApplicationCommandType, ChannelType, PermissionFlagsBits } from 'discord.js';
import { CommandRegistry } from '../src/Services/CommandRegistry.js';
import { ExportCommands } from '../src/Services/CommandSync.js';
import { CommandBuilder } from '../src/Common/Command/CommandBuilder.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { Leaf } from './helpers/Fixtures.js';

describe('CommandSync', () => {
    it('should export a group tree with snake_case option fields', () => {
        const registry = new CommandRegistry({ eventBus: new MainEventBus() });
        registry.Register(
            new CommandBuilder('config')
                .setDescription('Configure the bot')
                .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
                .setDMPermission(false)
                .addSubcommandGroup(g =>
                    g
                        .setName('channel')
                        .setDescription('Channel settings')
                        .addSubcommand(s =>
                            s
                                .setName('set')
                                .setDescription('Set the log channel')
                                .addChannelOption(o =>
                                    o.setName('target').setDescription('Target').setRequired(true).addChannelTypes(ChannelType.GuildText),
                                )
                                .addIntegerOption(o => o.setName('keep').setDescription('Days to keep').setMinValue(1).setMaxValue(30))
                                .setHandler(() => 'set'),
                        ),
                )
                .build(),
        );

        expect(ExportCommands(registry)).toEqual([
            {
                name: 'config',
                description: 'Configure the bot',
                type: ApplicationCommandType.ChatInput,
                default_member_permissions: '32',
                dm_permission: false,
                nsfw: false,
                options: [
                    {
                        type: ApplicationCommandOptionType.SubcommandGroup,
                        name: 'channel',
                        description: 'Channel settings',
                        options: [
                            {
                                type: ApplicationCommandOptionType.Subcommand,
                                name: 'set',
                                description: 'Set the log channel',
                                options: [
                                    {
                                        type: ApplicationCommandOptionType.Channel,
                                        name: 'target',
                                        description: 'Target',
                                        required: true,
                                        channel_types: [ChannelType.GuildText],
                                    },
                                    {
                                        type: ApplicationCommandOptionType.Integer,
                                        name: 'keep',
                                        description: 'Days to keep',
                                        required: false,
                                        min_value: 1,
                                        max_value: 30,
                                    },
                                ],
                            },
                        ],
                    },
                ],
            },
        ]);
    });

    it('should export only the requested scope', () => {
        const registry = new CommandRegistry({ eventBus: new MainEventBus() });
        registry.Register(Leaf('ping').build());
        registry.Register(
            Leaf('search')
                .setScopes('111111111111111111')
                .setNSFW(true)
                .addStringOption(o => o.setName('query').setDescription('Query').setAutocomplete(true))
                .autocomplete('query', () => [])
                .build(),
        );

        expect(ExportCommands(registry).map(command => command.name)).toEqual(['ping']);
        expect(ExportCommands(registry, '111111111111111111')).toEqual([
            {
                name: 'search',
                description: 'search command',
                type: ApplicationCommandType.ChatInput,
                default_member_permissions: null,
                dm_permission: true,
                nsfw: true,
                options: [
                    {
                        type: ApplicationCommandOptionType.String,
                        name: 'query',
                        description: 'Query',
                        required: false,
                        autocomplete: true,
                    },
                ],
            },
        ]);
    });
});
