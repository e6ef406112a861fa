/**
 * Pet Resources — list (paginated) and detail
 */
import {
    createDebugObserver, createParams, createSerializer, defineResource, field, paginated, param, validators,
} from '../../../src/index.js';
import { type AppContext } from './context.js';

const debug = process.env['PETS_DEBUG'] ? createDebugObserver() : undefined;

export const PetSerializer = createSerializer('Pet')
    .field(field.raw('id', { details: 'pet id', readOnly: true }))
    .field(field.string('name', { details: 'pet name', required: true }))
    .field(field.string('species', { details: 'cat, dog, ...' }))
    .field(field.int('age', { details: 'age in years', min: 0, max: 40 }))
    .field(field.bool('vaccinated', { details: 'vaccination status', representations: ['no', 'yes'] }));

export const petList = defineResource(paginated<AppContext>({
    name: 'PetList',
    details: `
        All pets in the shelter.

        Filter by species or vaccination status.
    `,
    serializer: PetSerializer,
    params: createParams(
        param.string('species', { details: 'filter by species', validators: [validators.match(/^[a-z]+$/)] }),
        param.bool('vaccinated', { details: 'filter by vaccination status' }),
    ),
    debug,
    handlers: {
        GET: ({ params, meta, context }) => {
            const species = params['species'];
            const vaccinated = params['vaccinated'];
            const page = context.store.page(
                {
                    species: typeof species === 'string' ? species : undefined,
                    vaccinated: typeof vaccinated === 'boolean' ? vaccinated : undefined,
                },
                Number(params['page']),
                Number(params['page_size']),
            );
            meta['has_more'] = page.hasMore;
            return page.items;
        },
        POST: ({ validated, context }) => context.store.create(validated ?? {}),
    },
}, { defaultPageSize: 20 }));

export const pet = defineResource<AppContext>({
    name: 'Pet',
    details: 'Single pet identified by its id',
    serializer: PetSerializer,
    debug,
    handlers: {
        GET: ({ route, context }) => context.store.get(Number(route['pet_id'])),
        PUT: ({ route, validated, context }) => context.store.update(Number(route['pet_id']), validated ?? {}),
        PATCH: ({ route, validated, context }) => context.store.update(Number(route['pet_id']), validated ?? {}),
        DELETE: ({ route, context }) => {
            context.store.delete(Number(route['pet_id']));
        },
    },
});
