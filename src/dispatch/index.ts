/** Dispatch Bounded Context — Barrel Export */
export { ResourceDispatcher, defineResource } from './ResourceDispatcher.js';
export { paginated, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, type PaginationOptions } from './Pagination.js';
export { describeResource, type ResourceDescription } from './describe.js';
export {
    resolveVerb, resolveParams, decodeBody, encodeResult, statusFor, VERB_POLICIES,
    type VerbPolicy, type ResolvedVerb,
} from './DispatchPipeline.js';
export {
    HTTP_METHODS, isHttpMethod,
    type HttpMethod, type ResourceType, type Meta, type HandlerCall, type Handler, type Handlers,
    type ResourceDefinition, type DispatchRequest, type Envelope, type DispatchOutcome,
} from './types.js';
