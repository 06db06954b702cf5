import type { ObjMap } from '../types/ObjMap.js';

import {
  enumType,
  interfaceType,
  listOf,
  nonNull,
  objectType,
} from '../type/definition.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

import { buildTestRegistry } from './buildTestRegistry.js';

/**
 * A small graph of characters: an interface `Character` implemented by
 * `Human` and `Droid`, an `Episode` enum whose symbols map to numbers, and a
 * query root with `hero`, `human` and `droid` entry points.
 */

export interface HumanData {
  type: 'Human';
  id: string;
  name: string;
  friends: ReadonlyArray<string>;
  appearsIn: ReadonlyArray<number>;
  homePlanet?: string;
}

export interface DroidData {
  type: 'Droid';
  id: string;
  name: string;
  friends: ReadonlyArray<string>;
  appearsIn: ReadonlyArray<number>;
  primaryFunction: string;
}

export type CharacterData = HumanData | DroidData;

const mira: HumanData = {
  type: 'Human',
  id: '1000',
  name: 'Mira Okonkwo',
  friends: ['1002', '2000'],
  appearsIn: [4, 5, 6],
  homePlanet: 'Vessa',
};

const toren: HumanData = {
  type: 'Human',
  id: '1001',
  name: 'Toren Valk',
  friends: ['1000'],
  appearsIn: [4, 5, 6],
  homePlanet: 'Kharos',
};

const ilsa: HumanData = {
  type: 'Human',
  id: '1002',
  name: 'Ilsa Marr',
  friends: ['1000', '2001'],
  appearsIn: [4, 5],
};

const relay: DroidData = {
  type: 'Droid',
  id: '2000',
  name: 'K-7 Relay',
  friends: ['1000', '1001'],
  appearsIn: [4, 5, 6],
  primaryFunction: 'Navigation',
};

const quill: DroidData = {
  type: 'Droid',
  id: '2001',
  name: 'Q-12',
  friends: ['1002'],
  appearsIn: [4],
  primaryFunction: 'Repair',
};

const humanData: ObjMap<HumanData> = {
  [mira.id]: mira,
  [toren.id]: toren,
  [ilsa.id]: ilsa,
};

const droidData: ObjMap<DroidData> = {
  [relay.id]: relay,
  [quill.id]: quill,
};

export function getHuman(id: string): HumanData | null {
  return Object.hasOwn(humanData, id) ? humanData[id] : null;
}

export function getDroid(id: string): DroidData | null {
  return Object.hasOwn(droidData, id) ? droidData[id] : null;
}

/**
 * Friends are looked up asynchronously, so that lists of promises are
 * exercised.
 */
function getFriends(
  character: CharacterData,
): Array<Promise<CharacterData | null>> {
  return character.friends.map((id) =>
    Promise.resolve(getHuman(id) ?? getDroid(id)),
  );
}

/**
 * The hero of the fifth episode is Mira; otherwise it is K-7 Relay.
 */
export function getHero(episode: unknown): CharacterData {
  return episode === 5 ? mira : relay;
}

export const episodeEnum = enumType({
  name: 'Episode',
  description: 'One of the episodes of the saga.',
  values: {
    NEWHOPE: { value: 4, description: 'The first episode.' },
    EMPIRE: { value: 5, description: 'The second episode.' },
    JEDI: { value: 6, description: 'The third episode.' },
  },
});

export const characterInterface = interfaceType({
  name: 'Character',
  description: 'A character in the saga.',
  fields: {
    id: {
      type: nonNull('String'),
      description: 'The id of the character.',
    },
    name: {
      type: 'String',
      description: 'The name of the character.',
    },
    friends: {
      type: listOf('Character'),
      description:
        'The friends of the character, or an empty list if they have none.',
    },
    appearsIn: {
      type: listOf('Episode'),
      description: 'Which episodes they appear in.',
    },
    secretBackstory: {
      type: 'String',
      description: 'All secrets about their past.',
    },
  },
  resolveType(character) {
    if (character !== null && typeof character === 'object') {
      const id = 'id' in character ? character.id : undefined;
      if (typeof id === 'string') {
        return getHuman(id) !== null ? 'Human' : 'Droid';
      }
    }
    return undefined;
  },
});

export const humanType = objectType<HumanData>({
  name: 'Human',
  description: 'A humanoid creature in the saga.',
  interfaces: ['Character'],
  fields: {
    id: { type: nonNull('String') },
    name: { type: 'String' },
    friends: {
      type: listOf('Character'),
      resolve: (human) => getFriends(human),
    },
    appearsIn: { type: listOf('Episode') },
    homePlanet: {
      type: 'String',
      description: 'The home planet of the human, or null if unknown.',
    },
    secretBackstory: {
      type: 'String',
      resolve() {
        throw new Error('secretBackstory is secret.');
      },
    },
  },
});

export const droidType = objectType<DroidData>({
  name: 'Droid',
  description: 'A mechanical creature in the saga.',
  interfaces: ['Character'],
  fields: {
    id: { type: nonNull('String') },
    name: { type: 'String' },
    friends: {
      type: listOf('Character'),
      resolve: (droid) => getFriends(droid),
    },
    appearsIn: { type: listOf('Episode') },
    secretBackstory: {
      type: 'String',
      resolve() {
        throw new Error('secretBackstory is secret.');
      },
    },
    primaryFunction: {
      type: 'String',
      description: 'The primary function of the droid.',
    },
  },
});

export const queryType = objectType({
  name: 'Query',
  fields: {
    hero: {
      type: 'Character',
      args: {
        episode: {
          type: 'Episode',
          description:
            'If omitted, returns the hero of the whole saga. If provided, returns the hero of that particular episode.',
        },
      },
      resolve: (_source, { episode }) => getHero(episode),
    },
    human: {
      type: 'Human',
      args: {
        id: { type: nonNull('String'), description: 'id of the human' },
      },
      resolve: (_source, { id }) =>
        typeof id === 'string' ? getHuman(id) : null,
    },
    droid: {
      type: 'Droid',
      args: {
        id: { type: nonNull('String'), description: 'id of the droid' },
      },
      resolve: (_source, { id }) =>
        typeof id === 'string' ? getDroid(id) : null,
    },
  },
});

export const characterRegistry: TypeRegistry = buildTestRegistry({
  query: queryType,
  types: [characterInterface, humanType, droidType, episodeEnum],
});
