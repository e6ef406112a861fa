/**
 * Application Context — Shared State for Every Resource Handler
 *
 * Every handler receives `context` alongside params and the decoded
 * body. Extend it with your own services (DB client, auth, ...).
 */
import { PetStore } from './db.js';

export interface AppContext {
    readonly store: PetStore;
    /** Caller identity, taken from the request in production */
    readonly user: string;
}

const store = new PetStore([
    { name: 'Molly', species: 'cat', age: 3, vaccinated: true },
    { name: 'Rex', species: 'dog', age: 5, vaccinated: true },
    { name: 'Luna', species: 'cat', age: 1, vaccinated: false },
]);

export function createContext(): AppContext {
    return { store, user: 'anonymous' };
}
