import { describe, it, expect, vi } from 'vitest';
import { AutocompleteResolver, type AutocompleteRequest } from '../src/Services/AutocompleteResolver.js';
import { CommandRegistry } from '../src/Services/CommandRegistry.js';
import { HandlerFaultError, TimeoutError, UnknownOptionError } from '../src/Common/Errors.js';
import { SetLogLevel } from '../src/Common/Log.js';
import type { AutocompleteCallback } from '../src/Domain/Command.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { Leaf, Sleep } from './helpers/Fixtures.js';

function Search(callback: AutocompleteCallback) {
    return Leaf('search')
        .addStringOption(o => o.setName('query').setDescription('Query').setRequired(true).setAutocomplete(true))
        .addStringOption(o => o.setName('scope').setDescription('Scope'))
        .autocomplete('query', callback)
        .build();
}

function Request(focused: string = 'query'): AutocompleteRequest {
    return {
        path: { name: 'search' },
        focused,
        value: 'ap',
        options: { query: 'ap' },
        userId: '100000000000000001',
        guildId: '200000000000000002',
    };
}

function Resolver(budgetMs: number = 2500, maxAutocompleteChoices: number = 25) {
    const registry = new CommandRegistry({ eventBus: new MainEventBus() });
    return { registry, resolver: new AutocompleteResolver(registry, { autocompleteBudgetMs: budgetMs, maxAutocompleteChoices }) };
}

describe('AutocompleteResolver', () => {
    it('should normalize bare values and pass the partial input', async () => {
        const callback = vi.fn<AutocompleteCallback>(call => [`${call.value}ple`, 42, { name: 'Apricot', value: 'apricot' }]);
        const { registry, resolver } = Resolver();
        registry.Register(Search(callback));

        const choices = await resolver.Resolve(Request());

        expect(choices).toEqual([
            { name: 'apple', value: 'apple' },
            { name: '42', value: 42 },
            { name: 'Apricot', value: 'apricot' },
        ]);
        expect(callback).toHaveBeenCalledWith(expect.objectContaining({ option: 'query', value: 'ap', guildId: '200000000000000002' }));
    });

    it('should truncate to the choice limit and clip long names', async () => {
        const long = 'x'.repeat(150);
        const { resolver } = Resolver();
        const node = Search(() => [long, ...Array.from({ length: 29 }, (_, i) => `item-${i}`)]);

        const choices = await resolver.ResolveFor(node, Request());

        expect(choices).toHaveLength(25);
        expect(choices[0]).toEqual({ name: 'x'.repeat(100), value: 'x'.repeat(100) });
        expect(choices[24]).toEqual({ name: 'item-23', value: 'item-23' });
    });

    it('should honour a lower configured choice limit', async () => {
        const { resolver } = Resolver(2500, 5);
        const node = Search(() => Array.from({ length: 10 }, (_, i) => i));

        expect(await resolver.ResolveFor(node, Request())).toHaveLength(5);
    });

    it('should reject unknown and non-autocomplete options without invoking the callback', async () => {
        const callback = vi.fn<AutocompleteCallback>(() => []);
        const { resolver } = Resolver();
        const node = Search(callback);

        await expect(resolver.ResolveFor(node, Request('missing'))).rejects.toBeInstanceOf(UnknownOptionError);
        await expect(resolver.ResolveFor(node, Request('scope'))).rejects.toMatchObject({
            details: { path: 'search', option: 'scope', reason: 'not-autocomplete' },
        });
        expect(callback).not.toHaveBeenCalled();
    });

    it('should wrap callback faults', async () => {
        const { resolver } = Resolver();
        const node = Search(() => {
            throw new Error('index offline');
        });

        await expect(resolver.ResolveFor(node, Request())).rejects.toBeInstanceOf(HandlerFaultError);
    });

    it('should time out a slow callback and log its late rejection', async () => {
        SetLogLevel('warn');
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const { resolver } = Resolver(20);
        const node = Search(async () => {
            await Sleep(60);
            throw new Error('late');
        });

        await expect(resolver.ResolveFor(node, Request())).rejects.toBeInstanceOf(TimeoutError);
        await Sleep(80);

        expect(warn).toHaveBeenCalledWith(expect.stringContaining("Abandoned autocomplete for 'search' rejected: late"));
    });
});
