/**
 * In-Memory Database — Model Layer
 *
 * Simulates a real database with a single Pet model.
 * Replace with any ORM or query builder in production.
 */
import { NotFoundError, type ObjectDict } from '../../../src/index.js';

// ── Models ───────────────────────────────────────────────

export interface Pet {
    id: number;
    name: string;
    species: string;
    age: number | null;
    vaccinated: boolean;
}

export interface PetPage {
    items: Pet[];
    hasMore: boolean;
}

// ── Store ────────────────────────────────────────────────

export class PetStore {
    private readonly _pets = new Map<number, Pet>();
    private _nextId = 1;

    constructor(seed: readonly Omit<Pet, 'id'>[] = []) {
        for (const pet of seed) this._insert(pet);
    }

    page(filter: { species?: string; vaccinated?: boolean }, page: number, pageSize: number): PetPage {
        const matching = [...this._pets.values()].filter(pet =>
            (filter.species === undefined || pet.species === filter.species) &&
            (filter.vaccinated === undefined || pet.vaccinated === filter.vaccinated));
        const start = page * pageSize;
        return {
            items: matching.slice(start, start + pageSize),
            hasMore: matching.length > start + pageSize,
        };
    }

    get(id: number): Pet {
        const pet = this._pets.get(id);
        if (!pet) throw new NotFoundError(`Pet ${id} does not exist`);
        return pet;
    }

    create(fields: ObjectDict): Pet {
        const { name, species, age, vaccinated } = fields;
        return this._insert({
            name: String(name),
            species: typeof species === 'string' ? species : 'cat',
            age: typeof age === 'number' ? age : null,
            vaccinated: vaccinated === true,
        });
    }

    update(id: number, fields: ObjectDict): Pet {
        const pet = this.get(id);
        const { name, species, age, vaccinated } = fields;
        const updated: Pet = {
            ...pet,
            name: typeof name === 'string' ? name : pet.name,
            species: typeof species === 'string' ? species : pet.species,
            age: typeof age === 'number' ? age : pet.age,
            vaccinated: typeof vaccinated === 'boolean' ? vaccinated : pet.vaccinated,
        };
        this._pets.set(id, updated);
        return updated;
    }

    delete(id: number): void {
        this.get(id);
        this._pets.delete(id);
    }

    private _insert(fields: Omit<Pet, 'id'>): Pet {
        const pet: Pet = { id: this._nextId++, ...fields };
        this._pets.set(pet.id, pet);
        return pet;
    }
}
