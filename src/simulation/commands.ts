/**
 * commands.ts
 *
 * Line commands typed at the prompt.  Every command turns into a list of
 * messages for the player; nothing in-game throws out of executeCommand.
 * Save-store failures and corrupt saves are caught here and reported the
 * same way, and a failed load leaves the live state exactly as it was.
 */

import { build, buildingCount, buildingCost, villagerCapacity } from './buildings';
import { catalog, workerTypeDefinition } from './catalog';
import { KNOWLEDGE_TASK } from './constants';
import type { GameState, Severity } from './engine';
import { replaceGameState } from './engine';
import { getTopic, searchTopics, topicList } from './library';
import type { LibraryTopic } from './library';
import { unlockedBuildings, unlockedWorkerTypes } from './progression';
import { availableTechnologies, researchedTechnologies, researchProgress, startResearch } from './research';
import { getResource, removeResource, totalFood, hasResource } from './resources';
import type { SaveRecord } from './snapshot';
import { parseSaveRecord, restoreGameState, toSaveRecord } from './snapshot';
import {
    addBuildingBuilt,
    addEvent,
    addVillagersRecruited,
    playTime,
    recentEvents,
    totalBuildingsBuilt,
    totalResourcesGathered,
    totalVillagersRecruited,
} from './stats';
import { addWorkers, assignWorkers, foodUpkeep, totalWorkers, unassignWorkers } from './workforce';

export type CommandMessage = {
    text: string;
    severity: Severity;
};

export type CommandResult = {
    messages: CommandMessage[];
    quit: boolean;
};

export type ParsedCommand = {
    name: string;
    args: string[];
};

export type SaveSummary = {
    name: string;
    savedAt: string;
    tick: number;
    age: string;
};

/** Where named saves live.  `load` resolves to null for a name never saved. */
export interface SaveStore {
    save(name: string, record: SaveRecord): Promise<void>;
    load(name: string): Promise<unknown | null>;
    list(): Promise<SaveSummary[]>;
}

export type CommandContext = {
    saveStore: SaveStore;
    now?: number;
};

export const COMMANDS: ReadonlyArray<{ name: string; description: string }> = [
    { name: 'help', description: 'Display available commands' },
    { name: 'gather', description: 'Assign villagers to gather resources (gather <resource> <count>)' },
    { name: 'build', description: 'Build a structure (build <building>)' },
    { name: 'status', description: 'Show a summary of your settlement' },
    { name: 'assign', description: 'Assign workers to tasks (assign <worker_type> <task> <count>)' },
    { name: 'unassign', description: 'Return workers to idle (unassign <worker_type> <task> <count>)' },
    { name: 'recruit', description: 'Recruit new workers (recruit <worker_type> <count>)' },
    { name: 'buildings', description: 'List buildings, their costs and availability' },
    { name: 'research', description: 'Start researching a technology (research <technology>)' },
    { name: 'techs', description: 'List technologies available for research' },
    { name: 'library', description: 'Read the in-game library (library [topic])' },
    { name: 'save', description: 'Save the current game (save <name>)' },
    { name: 'load', description: 'Load a saved game (load <name>)' },
    { name: 'saves', description: 'List saved games' },
    { name: 'stats', description: 'Display game statistics' },
    { name: 'quit', description: 'Exit the game' },
];

export const SAVE_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const RECENT_EVENT_LIMIT = 10;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Whole numbers print bare, everything else with one decimal. */
export const formatAmount = (amount: number): string =>
    Number.isInteger(amount) ? String(amount) : amount.toFixed(1);

const formatCost = (cost: Record<string, number>): string =>
    Object.entries(cost)
        .map(([resource, amount]) => `${formatAmount(amount)} ${resource}`)
        .join(', ');

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const parseCommand = (line: string): ParsedCommand | null => {
    const parts = line.trim().split(/\s+/).filter(Boolean);
    if (parts.length === 0) {
        return null;
    }
    const [name, ...args] = parts;
    return { name: name.toLowerCase(), args };
};

/** Positive integer from a command argument, or null. */
export const parseCount = (arg: string): number | null => {
    if (!/^\+?\d+$/.test(arg)) {
        return null;
    }
    const count = Number(arg);
    return Number.isSafeInteger(count) && count > 0 ? count : null;
};

class Reply {
    readonly messages: CommandMessage[] = [];
    quit = false;

    info(text: string): this {
        return this.push(text, 'info');
    }
    success(text: string): this {
        return this.push(text, 'success');
    }
    warning(text: string): this {
        return this.push(text, 'warning');
    }
    error(text: string): this {
        return this.push(text, 'error');
    }
    highlight(text: string): this {
        return this.push(text, 'highlight');
    }

    push(text: string, severity: Severity): this {
        this.messages.push({ text, severity });
        return this;
    }

    result(): CommandResult {
        return { messages: this.messages, quit: this.quit };
    }
}

const COUNT_ERROR = 'Count must be a positive number';

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

function cmdHelp(reply: Reply): void {
    reply.highlight('=== Commands ===');
    for (const { name, description } of COMMANDS) {
        reply.info(`${name}: ${description}`);
    }
}

function cmdGather(state: GameState, args: string[], reply: Reply): void {
    if (args.length !== 2) {
        reply.error('Usage: gather <resource> <count>');
        return;
    }
    const [resource, countArg] = args;
    const count = parseCount(countArg);
    if (count === null) {
        reply.error(COUNT_ERROR);
        return;
    }
    if (assignWorkers(state.workforce, 'villager', resource, count)) {
        reply.success(`Assigned ${count} villagers to gather ${resource}`);
    } else {
        reply.error('Failed to assign villagers. Not enough idle villagers or invalid resource.');
    }
}

function cmdBuild(state: GameState, args: string[], reply: Reply, now: number): void {
    if (args.length !== 1) {
        reply.error('Usage: build <building>');
        return;
    }
    const [building] = args;
    if (!unlockedBuildings(state.age).includes(building)) {
        reply.error(`${building} is not available in the ${state.age}`);
        return;
    }
    if (!build(state.buildings, building, state.resources)) {
        reply.error(`Failed to build ${building}. Required resources: ${formatCost(buildingCost(building))}`);
        return;
    }
    reply.success(`Built a new ${building}`);
    addEvent(state.stats, state.tick, 'building_built', `Built a new ${building}`, now);
    addBuildingBuilt(state.stats, building);
}

function cmdStatus(state: GameState, reply: Reply): void {
    reply.highlight('=== Status ===');
    reply.info(`Age: ${state.age}`);
    reply.info(`Tick: ${state.tick}`);
    reply.info(`Food: ${formatAmount(totalFood(state.resources))} (upkeep ${formatAmount(foodUpkeep(state.workforce))}/tick)`);
    reply.info(`Population: ${totalWorkers(state.workforce)}/${villagerCapacity(state.buildings)}`);
    for (const [workerType, group] of Object.entries(state.workforce)) {
        if (group.count === 0) {
            continue;
        }
        const jobs = Object.entries(group.assignment)
            .filter(([, n]) => n > 0)
            .map(([task, n]) => `${task} ${n}`)
            .join(', ');
        reply.info(`${workerType}s: ${group.count} (${jobs})`);
    }
    const research = researchProgress(state.research);
    reply.info(
        research.current === null
            ? 'Research: none'
            : `Research: ${research.current} ${research.progress.toFixed(1)} / ${research.cost.toFixed(1)}`,
    );
}

function cmdAssign(state: GameState, args: string[], reply: Reply, unassign: boolean): void {
    const verb = unassign ? 'unassign' : 'assign';
    if (args.length !== 3) {
        reply.error(`Usage: ${verb} <worker_type> <task> <count>`);
        return;
    }
    const [workerType, task, countArg] = args;
    const count = parseCount(countArg);
    if (count === null) {
        reply.error(COUNT_ERROR);
        return;
    }

    if (unassign) {
        if (unassignWorkers(state.workforce, workerType, task, count)) {
            reply.success(`Unassigned ${count} ${workerType}s from ${task}`);
        } else {
            reply.error(`Failed to unassign ${workerType}s. Not enough assigned to ${task}.`);
        }
        return;
    }
    if (assignWorkers(state.workforce, workerType, task, count)) {
        reply.success(`Assigned ${count} ${workerType}s to ${task}`);
    } else {
        reply.error(`Failed to assign ${workerType}s. Not enough idle workers or invalid task.`);
    }
}

function cmdRecruit(state: GameState, args: string[], reply: Reply, now: number): void {
    if (args.length !== 2) {
        reply.error('Usage: recruit <worker_type> <count>');
        return;
    }
    const [workerType, countArg] = args;
    const count = parseCount(countArg);
    if (count === null) {
        reply.error(COUNT_ERROR);
        return;
    }

    const definition = workerTypeDefinition(workerType);
    if (!definition || !unlockedWorkerTypes(state.age).includes(workerType)) {
        reply.error(`${workerType} is not available in the ${state.age}`);
        return;
    }

    const population = totalWorkers(state.workforce);
    const capacity = villagerCapacity(state.buildings);
    if (population + count > capacity) {
        reply.error(`Not enough housing capacity. Current: ${population}/${capacity}`);
        return;
    }

    const foodCost = definition.upkeep * count;
    if (!hasResource(state.resources, 'food', foodCost)) {
        reply.error(`Not enough food. Need ${formatAmount(foodCost)} food.`);
        return;
    }

    removeResource(state.resources, 'food', foodCost);
    addWorkers(state.workforce, workerType, count);
    reply.success(`Recruited ${count} new ${workerType}s`);
    addEvent(state.stats, state.tick, 'villager_recruited', `Recruited ${count} new ${workerType}s`, now);
    addVillagersRecruited(state.stats, workerType, count);
}

function cmdBuildings(state: GameState, reply: Reply): void {
    const unlocked = unlockedBuildings(state.age);
    reply.highlight('=== Buildings ===');
    for (const building of catalog.buildings) {
        const line = `${building.name}: ${building.description} (Cost: ${formatCost(building.cost)}; Built: ${buildingCount(state.buildings, building.name)})`;
        if (unlocked.includes(building.name)) {
            reply.info(line);
        } else {
            const unlockAge = catalog.ages.find((a) => a.unlocks.buildings.includes(building.name))?.name;
            reply.warning(unlockAge ? `${line} - unlocks in the ${unlockAge}` : `${line} - locked`);
        }
    }
}

function cmdResearch(state: GameState, args: string[], reply: Reply, now: number): void {
    if (args.length !== 1) {
        reply.error('Usage: research <technology>');
        return;
    }
    const [name] = args;
    if (!availableTechnologies(state.research, state.age).some((t) => t.name === name)) {
        reply.error(`Technology '${name}' is not available for research.`);
        return;
    }

    const current = researchProgress(state.research);
    if (current.current !== null) {
        reply.error(
            `You are already researching ${current.current} (${current.progress.toFixed(1)} / ${current.cost.toFixed(1)})`,
        );
        return;
    }

    if (getResource(state.resources, KNOWLEDGE_TASK) <= 0) {
        reply.error(
            'You cannot research any technology without knowledge points. Assign villagers to gather knowledge.',
        );
        return;
    }

    if (startResearch(state.research, name)) {
        reply.success(`Started researching ${name}`);
        addEvent(state.stats, state.tick, 'research_started', `Started researching ${name}`, now);
    } else {
        reply.error(`Failed to start research on ${name}`);
    }
}

function cmdTechs(state: GameState, reply: Reply): void {
    const available = availableTechnologies(state.research, state.age);
    if (available.length === 0) {
        reply.info(`No technologies available for research in the ${state.age}`);
        return;
    }
    if (getResource(state.resources, KNOWLEDGE_TASK) <= 0) {
        reply.warning('Note: You need knowledge points to start researching. Assign villagers to gather knowledge.');
    }

    reply.highlight('=== Available Technologies ===');
    for (const tech of available) {
        reply.info(`${tech.name}: ${tech.description} (Cost: ${formatAmount(tech.cost)} knowledge)`);
    }

    const current = researchProgress(state.research);
    if (current.current !== null && current.cost > 0) {
        const percent = (current.progress / current.cost) * 100;
        reply.highlight('=== Current Research ===');
        reply.success(
            `${current.current}: ${current.progress.toFixed(1)} / ${current.cost.toFixed(1)} (${percent.toFixed(1)}%)`,
        );
    }

    const researched = researchedTechnologies(state.research);
    if (researched.length > 0) {
        reply.highlight('=== Researched Technologies ===');
        for (const tech of researched) {
            reply.info(`${tech.name}: ${tech.description}`);
        }
    }
}

function showTopic(topic: LibraryTopic, reply: Reply): void {
    reply.highlight(`=== ${topic.title} ===`);
    for (const line of topic.content.split('\n')) {
        reply.info(line);
    }
}

function showTopicList(topics: { id: string; title: string }[], reply: Reply): void {
    reply.highlight('=== Library ===');
    for (const { id, title } of topics) {
        reply.info(`${id}: ${title}`);
    }
    reply.info("Type 'library <topic>' to read a topic.");
}

function cmdLibrary(args: string[], reply: Reply): void {
    if (args.length === 0) {
        showTopicList(topicList(), reply);
        return;
    }
    const query = args.join(' ').toLowerCase();
    const topic = getTopic(query);
    if (topic) {
        showTopic(topic, reply);
        return;
    }
    const hits = searchTopics(query);
    if (hits.length === 0) {
        reply.error(`Topic not found: ${query}`);
    } else if (hits.length === 1) {
        showTopic(hits[0], reply);
    } else {
        showTopicList(hits, reply);
    }
}

function cmdStats(state: GameState, reply: Reply, now: number): void {
    const { stats } = state;
    reply.highlight('=== Game Statistics ===');
    reply.info(`Play time: ${playTime(stats, now)}`);
    reply.info(`Current age: ${state.age}`);
    reply.info(`Game ticks: ${state.tick}`);

    reply.highlight('=== Resources Gathered ===');
    for (const [resource, amount] of Object.entries(stats.resourcesGathered)) {
        reply.info(`${resource}: ${amount.toFixed(1)}`);
    }
    reply.success(`Total resources: ${totalResourcesGathered(stats).toFixed(1)}`);

    reply.highlight('=== Buildings Built ===');
    for (const [building, count] of Object.entries(stats.buildingsBuilt)) {
        reply.info(`${building}: ${count}`);
    }
    reply.success(`Total buildings: ${totalBuildingsBuilt(stats)}`);

    reply.highlight('=== Workers Recruited ===');
    for (const [workerType, count] of Object.entries(stats.villagersRecruited)) {
        reply.info(`${workerType}: ${count}`);
    }
    reply.success(`Total workers: ${totalVillagersRecruited(stats)}`);

    reply.highlight('=== Ages Reached ===');
    for (const age of stats.agesReached) {
        reply.info(age);
    }

    reply.highlight('=== Recent Events ===');
    for (const event of recentEvents(stats, RECENT_EVENT_LIMIT)) {
        reply.info(`Tick ${event.tick}: ${event.message}`);
    }
}

const checkSaveName = (args: string[], usage: string, reply: Reply): string | null => {
    if (args.length !== 1) {
        reply.error(usage);
        return null;
    }
    const [name] = args;
    if (!SAVE_NAME_PATTERN.test(name)) {
        reply.error(`Invalid save name '${name}'. Use 1-64 letters, digits, '-' or '_'.`);
        return null;
    }
    return name;
};

async function cmdSave(state: GameState, args: string[], reply: Reply, context: CommandContext, now: number) {
    const name = checkSaveName(args, 'Usage: save <name>', reply);
    if (name === null) {
        return;
    }
    try {
        await context.saveStore.save(name, toSaveRecord(state, now));
        reply.success(`Game saved as '${name}'`);
    } catch (err) {
        console.error('[commands] Save failed:', err);
        reply.error(`Failed to save game: ${errorMessage(err)}`);
    }
}

async function cmdLoad(state: GameState, args: string[], reply: Reply, context: CommandContext, now: number) {
    const name = checkSaveName(args, 'Usage: load <name>', reply);
    if (name === null) {
        return;
    }
    try {
        const raw = await context.saveStore.load(name);
        if (raw === null) {
            reply.error(`Failed to load game: no save named '${name}'`);
            return;
        }
        const next = restoreGameState(parseSaveRecord(raw), now);
        replaceGameState(state, next);
        reply.success(`Game '${name}' loaded successfully`);
    } catch (err) {
        reply.error(`Failed to load game: ${errorMessage(err)}`);
    }
}

async function cmdSaves(reply: Reply, context: CommandContext) {
    let saves: SaveSummary[];
    try {
        saves = await context.saveStore.list();
    } catch (err) {
        console.error('[commands] Listing saves failed:', err);
        reply.error(`Failed to list saves: ${errorMessage(err)}`);
        return;
    }
    if (saves.length === 0) {
        reply.info('No saved games found');
        return;
    }
    reply.info('Available saved games:');
    for (const save of saves) {
        reply.info(`- ${save.name} (${save.age}, tick ${save.tick}, saved ${save.savedAt})`);
    }
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/**
 * Run one command line against the state.  An empty line yields an empty
 * result.
 */
export async function executeCommand(state: GameState, line: string, context: CommandContext): Promise<CommandResult> {
    const reply = new Reply();
    const command = parseCommand(line);
    if (!command) {
        return reply.result();
    }
    const now = context.now ?? Date.now();
    const { name, args } = command;

    switch (name) {
        case 'help':
            cmdHelp(reply);
            break;
        case 'gather':
            cmdGather(state, args, reply);
            break;
        case 'build':
            cmdBuild(state, args, reply, now);
            break;
        case 'status':
            cmdStatus(state, reply);
            break;
        case 'assign':
            cmdAssign(state, args, reply, false);
            break;
        case 'unassign':
            cmdAssign(state, args, reply, true);
            break;
        case 'recruit':
            cmdRecruit(state, args, reply, now);
            break;
        case 'buildings':
            cmdBuildings(state, reply);
            break;
        case 'research':
            cmdResearch(state, args, reply, now);
            break;
        case 'techs':
            cmdTechs(state, reply);
            break;
        case 'library':
            cmdLibrary(args, reply);
            break;
        case 'save':
            await cmdSave(state, args, reply, context, now);
            break;
        case 'load':
            await cmdLoad(state, args, reply, context, now);
            break;
        case 'saves':
            await cmdSaves(reply, context);
            break;
        case 'stats':
            cmdStats(state, reply, now);
            break;
        case 'quit':
            reply.info('Goodbye!');
            reply.quit = true;
            break;
        default:
            reply.error(`Unknown command: ${name}. Type 'help' for available commands.`);
    }
    return reply.result();
}
