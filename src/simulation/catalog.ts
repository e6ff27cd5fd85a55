/**
 * catalog.ts
 *
 * Static tables for everything the settlement can stock, build, employ,
 * research and reach.  The tables are parsed with zod once at module load;
 * a cross-reference that does not resolve (a cost in an unknown resource, a
 * prerequisite that does not exist, a prerequisite cycle, ...) throws before
 * the first tick is ever run.
 *
 * `food` is not a stock of its own: wherever a table names it, it means the
 * aggregate of the food-source resources (see resources.ts).
 */

import { z } from 'zod';
import { FOOD } from './constants';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** Technology bonuses that name this resource apply to every resource. */
export const ALL_RESOURCES = 'all';

const amountsSchema = z.record(z.string(), z.number().nonnegative());
const countsSchema = z.record(z.string(), z.number().int().nonnegative());

const resourceSchema = z.object({
    name: z.string().min(1),
    label: z.string().min(1),
    baseRate: z.number().nonnegative(),
    foodSource: z.boolean(),
});

const buildingSchema = z.object({
    name: z.string().min(1),
    description: z.string(),
    cost: amountsSchema,
    /** Flat amount added per tick, per building. */
    production: amountsSchema,
    /** Housing added per building. */
    villagerCapacity: z.number().nonnegative(),
    /** worker type -> resource -> additive gathering bonus, per building. */
    rateBonuses: z.record(z.string(), amountsSchema),
});

const workerTypeSchema = z.object({
    name: z.string().min(1),
    upkeep: z.number().nonnegative(),
    /** Declaration order is also the order assignments are drained in on removal. */
    tasks: z.array(z.string().min(1)).min(1),
    knowledgeModifier: z.number().nonnegative(),
    availableFromStart: z.boolean(),
});

const ageSchema = z.object({
    name: z.string().min(1),
    requirements: z.object({
        resources: amountsSchema,
        buildings: countsSchema,
    }),
    unlocks: z.object({
        buildings: z.array(z.string()),
        resources: z.array(z.string()),
        workerTypes: z.array(z.string()),
    }),
});

const technologyEffectSchema = z.object({
    resource: z.string().min(1),
    bonus: z.number().positive(),
});

const technologySchema = z.object({
    name: z.string().min(1),
    title: z.string().min(1),
    description: z.string(),
    age: z.string().min(1),
    cost: z.number().positive(),
    prerequisites: z.array(z.string()),
    effects: z.array(technologyEffectSchema),
});

const duplicates = (names: string[]): string[] => names.filter((name, i) => names.indexOf(name) !== i);

const catalogSchema = z
    .object({
        resources: z.array(resourceSchema).min(1),
        primaryFoodSource: z.string().min(1),
        buildings: z.array(buildingSchema),
        workerTypes: z.array(workerTypeSchema).min(1),
        ages: z.array(ageSchema).min(1),
        technologies: z.array(technologySchema),
    })
    .superRefine((tables, ctx) => {
        const report = (message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, message });

        const resources = new Set(tables.resources.map((r) => r.name));
        const buildings = new Set(tables.buildings.map((b) => b.name));
        const workerTypes = new Set(tables.workerTypes.map((w) => w.name));
        const ages = new Set(tables.ages.map((a) => a.name));
        const technologies = new Set(tables.technologies.map((t) => t.name));

        const isStockOrFood = (name: string) => name === FOOD || resources.has(name);
        const checkAll = (owner: string, names: Iterable<string>, known: (name: string) => boolean, what: string) => {
            for (const name of names) {
                if (!known(name)) {
                    report(`${owner} references unknown ${what} '${name}'`);
                }
            }
        };

        for (const [table, names] of [
            ['resources', tables.resources.map((r) => r.name)],
            ['buildings', tables.buildings.map((b) => b.name)],
            ['workerTypes', tables.workerTypes.map((w) => w.name)],
            ['ages', tables.ages.map((a) => a.name)],
            ['technologies', tables.technologies.map((t) => t.name)],
        ] as const) {
            for (const name of duplicates(names)) {
                report(`${table} lists '${name}' more than once`);
            }
        }
        if (resources.has(FOOD)) {
            report(`'${FOOD}' is reserved for the food aggregate`);
        }

        const primary = tables.resources.find((r) => r.name === tables.primaryFoodSource);
        if (!primary || !primary.foodSource) {
            report(`primary food source '${tables.primaryFoodSource}' is not a food-source resource`);
        }

        for (const building of tables.buildings) {
            const owner = `building '${building.name}'`;
            checkAll(owner, Object.keys(building.cost), isStockOrFood, 'resource');
            checkAll(owner, Object.keys(building.production), isStockOrFood, 'resource');
            checkAll(owner, Object.keys(building.rateBonuses), (n) => workerTypes.has(n), 'worker type');
            for (const bonuses of Object.values(building.rateBonuses)) {
                checkAll(owner, Object.keys(bonuses), (n) => resources.has(n), 'resource');
            }
        }

        for (const workerType of tables.workerTypes) {
            checkAll(`worker type '${workerType.name}'`, workerType.tasks, (n) => resources.has(n), 'task');
        }

        for (const age of tables.ages) {
            const owner = `age '${age.name}'`;
            checkAll(owner, Object.keys(age.requirements.resources), isStockOrFood, 'resource');
            checkAll(owner, Object.keys(age.requirements.buildings), (n) => buildings.has(n), 'building');
            checkAll(owner, age.unlocks.buildings, (n) => buildings.has(n), 'building');
            checkAll(owner, age.unlocks.resources, isStockOrFood, 'resource');
            checkAll(owner, age.unlocks.workerTypes, (n) => workerTypes.has(n), 'worker type');
        }

        const prerequisitesOf = new Map(tables.technologies.map((t) => [t.name, t.prerequisites]));
        for (const technology of tables.technologies) {
            const owner = `technology '${technology.name}'`;
            checkAll(owner, [technology.age], (n) => ages.has(n), 'age');
            checkAll(owner, technology.prerequisites, (n) => technologies.has(n), 'technology');
            checkAll(
                owner,
                technology.effects.map((e) => e.resource),
                (n) => n === ALL_RESOURCES || isStockOrFood(n),
                'resource',
            );
        }

        // Depth-first walk over the prerequisite graph; a name seen again on
        // the current path is a cycle.
        const settled = new Set<string>();
        const visit = (name: string, path: string[]): void => {
            if (path.includes(name)) {
                report(`technology prerequisites form a cycle: ${[...path, name].join(' -> ')}`);
                return;
            }
            if (settled.has(name)) {
                return;
            }
            for (const prerequisite of prerequisitesOf.get(name) ?? []) {
                visit(prerequisite, [...path, name]);
            }
            settled.add(name);
        };
        for (const technology of tables.technologies) {
            visit(technology.name, []);
        }
    });

export type ResourceDefinition = z.infer<typeof resourceSchema>;
export type BuildingDefinition = z.infer<typeof buildingSchema>;
export type WorkerTypeDefinition = z.infer<typeof workerTypeSchema>;
export type AgeDefinition = z.infer<typeof ageSchema>;
export type TechnologyEffect = z.infer<typeof technologyEffectSchema>;
export type TechnologyDefinition = z.infer<typeof technologySchema>;
export type Catalog = z.infer<typeof catalogSchema>;

/**
 * Parse a set of tables into a Catalog.  Throws a ZodError listing every
 * structural problem and unresolved reference.
 */
export const parseCatalog = (tables: unknown): Catalog => catalogSchema.parse(tables);

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const catalogTables = {
    resources: [
        { name: 'foraging', label: 'Foraged food', baseRate: 1.0, foodSource: true },
        { name: 'wood', label: 'Wood', baseRate: 1.0, foodSource: false },
        { name: 'stone', label: 'Stone', baseRate: 0.5, foodSource: false },
        { name: 'gold', label: 'Gold', baseRate: 0.2, foodSource: false },
        { name: 'knowledge', label: 'Knowledge', baseRate: 0.1, foodSource: false },
        { name: 'hunting', label: 'Game meat', baseRate: 1.8, foodSource: true },
    ],
    primaryFoodSource: 'foraging',
    buildings: [
        {
            name: 'hut',
            description: 'Houses two more villagers',
            cost: { wood: 20 },
            production: {},
            villagerCapacity: 2,
            rateBonuses: {},
        },
        {
            name: 'farm',
            description: 'Grows food every tick and helps foragers',
            cost: { wood: 100, stone: 50, food: 100 },
            production: { food: 3.5 },
            villagerCapacity: 0,
            rateBonuses: { villager: { foraging: 0.08 } },
        },
        {
            name: 'lumber_mill',
            description: 'Cuts wood every tick and speeds up woodcutters',
            cost: { wood: 100, stone: 300 },
            production: { wood: 2 },
            villagerCapacity: 0,
            rateBonuses: { villager: { wood: 0.1 } },
        },
        {
            name: 'mine',
            description: 'Yields stone and gold every tick and speeds up miners',
            cost: { wood: 100, stone: 400 },
            production: { stone: 1, gold: 0.2 },
            villagerCapacity: 0,
            rateBonuses: { villager: { stone: 0.05, gold: 0.05 } },
        },
        {
            name: 'market',
            description: 'Trades for gold every tick and speeds up gold gathering',
            cost: { wood: 200, stone: 200, gold: 100 },
            production: { gold: 0.5 },
            villagerCapacity: 0,
            rateBonuses: { villager: { gold: 0.1 } },
        },
        {
            name: 'library',
            description: 'Produces knowledge every tick and helps scholars most',
            cost: { wood: 400, stone: 200, knowledge: 100 },
            production: { knowledge: 0.5 },
            villagerCapacity: 0,
            rateBonuses: { scholar: { knowledge: 0.15 }, villager: { knowledge: 0.02 } },
        },
    ],
    workerTypes: [
        {
            name: 'villager',
            upkeep: 0.5,
            tasks: ['foraging', 'wood', 'stone', 'gold', 'knowledge', 'hunting'],
            knowledgeModifier: 0.2,
            availableFromStart: true,
        },
        {
            name: 'scholar',
            upkeep: 0.75,
            tasks: ['knowledge'],
            knowledgeModifier: 1.5,
            availableFromStart: false,
        },
    ],
    ages: [
        {
            name: 'Stone Age',
            requirements: { resources: {}, buildings: {} },
            unlocks: { buildings: ['hut', 'farm'], resources: ['food', 'wood'], workerTypes: [] },
        },
        {
            name: 'Bronze Age',
            requirements: { resources: { stone: 50, food: 100 }, buildings: { hut: 3, farm: 2 } },
            unlocks: { buildings: ['lumber_mill', 'mine'], resources: ['stone'], workerTypes: [] },
        },
        {
            name: 'Iron Age',
            requirements: {
                resources: { stone: 100, wood: 150, knowledge: 20 },
                buildings: { mine: 2, lumber_mill: 2 },
            },
            unlocks: { buildings: ['market', 'library'], resources: ['gold', 'knowledge'], workerTypes: [] },
        },
        {
            name: 'Medieval Age',
            requirements: {
                resources: { stone: 200, wood: 250, gold: 50, knowledge: 50 },
                buildings: { market: 1, library: 1 },
            },
            unlocks: { buildings: [], resources: [], workerTypes: ['scholar'] },
        },
        {
            name: 'Renaissance Age',
            requirements: { resources: { gold: 150, knowledge: 100 }, buildings: { library: 3, market: 2 } },
            unlocks: { buildings: [], resources: [], workerTypes: [] },
        },
        {
            name: 'Industrial Age',
            requirements: { resources: { gold: 300, knowledge: 200 }, buildings: { library: 5, market: 4 } },
            unlocks: { buildings: [], resources: [], workerTypes: [] },
        },
        {
            name: 'Modern Age',
            requirements: { resources: { gold: 500, knowledge: 400 }, buildings: { library: 8, market: 6 } },
            unlocks: { buildings: [], resources: [], workerTypes: [] },
        },
    ],
    technologies: [
        {
            name: 'agriculture',
            title: 'Agriculture',
            description: 'Improve food production methods',
            age: 'Stone Age',
            cost: 20,
            prerequisites: [],
            effects: [{ resource: 'food', bonus: 0.2 }],
        },
        {
            name: 'toolmaking',
            title: 'Toolmaking',
            description: 'Develop better tools for resource gathering',
            age: 'Stone Age',
            cost: 25,
            prerequisites: [],
            effects: [{ resource: ALL_RESOURCES, bonus: 0.1 }],
        },
        {
            name: 'writing',
            title: 'Writing',
            description: 'Develop a writing system to record knowledge',
            age: 'Bronze Age',
            cost: 40,
            prerequisites: [],
            effects: [{ resource: 'knowledge', bonus: 0.2 }],
        },
        {
            name: 'metallurgy',
            title: 'Metallurgy',
            description: 'Learn how to work with metals',
            age: 'Bronze Age',
            cost: 50,
            prerequisites: [],
            effects: [
                { resource: 'stone', bonus: 0.1 },
                { resource: 'gold', bonus: 0.1 },
            ],
        },
        {
            name: 'mathematics',
            title: 'Mathematics',
            description: 'Develop mathematical concepts',
            age: 'Iron Age',
            cost: 60,
            prerequisites: ['writing'],
            effects: [
                { resource: 'knowledge', bonus: 0.3 },
                { resource: ALL_RESOURCES, bonus: 0.1 },
            ],
        },
    ],
} satisfies z.input<typeof catalogSchema>;

export const catalog: Catalog = parseCatalog(catalogTables);

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

const indexByName = <T extends { name: string }>(items: T[]): ReadonlyMap<string, T> =>
    new Map(items.map((item) => [item.name, item]));

const resourcesByName = indexByName(catalog.resources);
const buildingsByName = indexByName(catalog.buildings);
const workerTypesByName = indexByName(catalog.workerTypes);
const agesByName = indexByName(catalog.ages);
const technologiesByName = indexByName(catalog.technologies);

export const resourceDefinition = (name: string): ResourceDefinition | undefined => resourcesByName.get(name);
export const buildingDefinition = (name: string): BuildingDefinition | undefined => buildingsByName.get(name);
export const workerTypeDefinition = (name: string): WorkerTypeDefinition | undefined => workerTypesByName.get(name);
export const ageDefinition = (name: string): AgeDefinition | undefined => agesByName.get(name);
export const technologyDefinition = (name: string): TechnologyDefinition | undefined => technologiesByName.get(name);

export const foodSources: readonly string[] = catalog.resources.filter((r) => r.foodSource).map((r) => r.name);
export const ageNames: readonly string[] = catalog.ages.map((a) => a.name);
