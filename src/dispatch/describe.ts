/**
 * Resource self-description, served for `OPTIONS`.
 *
 * A pure function of the resource's configuration: no request state, no
 * side effects, and a fixed key order so two calls serialize to the same
 * bytes.
 *
 * @module
 */
import { type FieldDescription } from '../fields/FieldDescriptor.js';
import { type ParamDescription } from '../params/ParamDescriptor.js';
import { type ResourceDispatcher } from './ResourceDispatcher.js';
import { type ResourceType } from './types.js';

export interface ResourceDescription {
    readonly name: string;
    readonly details: string;
    /** Handled verbs in canonical order, then `OPTIONS` */
    readonly methods: readonly string[];
    /** Route template, when the host supplied one */
    readonly path: string | null;
    readonly params: Record<string, ParamDescription>;
    /** `null` for resources without a serializer */
    readonly fields: Record<string, FieldDescription> | null;
    readonly type: ResourceType;
}

export function describeResource<TContext>(
    resource: ResourceDispatcher<TContext>,
    path?: string,
): ResourceDescription {
    return {
        name: resource.name,
        details: resource.details,
        methods: [...resource.methods, 'OPTIONS'],
        path: path ?? null,
        params: resource.params.describe(),
        fields: resource.serializer ? resource.serializer.describe() : null,
        type: resource.type,
    };
}
