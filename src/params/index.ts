/** Params Bounded Context — Barrel Export */
import {
    stringParam, intParam, floatParam, decimalParam, boolParam, base64Param, enumParam, zodParam,
} from './builtins.js';
import { defineParamKind } from './ParamDescriptor.js';
import * as containers from './Container.js';

/** Parameter factories: `param.int('age', { details: '...' })`. */
export const param = {
    string: stringParam,
    int: intParam,
    float: floatParam,
    decimal: decimalParam,
    bool: boolParam,
    base64: base64Param,
    enumOf: enumParam,
    fromZod: zodParam,
    custom: defineParamKind,
} as const;

export { containers };
export type { Container, ContainerKind } from './Container.js';
export {
    ParamDescriptor, defineParamKind,
    type Coercion, type ParamSpec, type ParamKind, type ParamFactory, type ParamResolution,
    type ParamDescription, type BaseParamOptions, type SingleParamOptions, type ManyParamOptions,
} from './ParamDescriptor.js';
export { zodCoercion } from './builtins.js';
export { ParameterSet, createParams, type Params } from './ParameterSet.js';
export {
    normalizeQuery, buildQueryString, toEchoValue, toQueryValues,
    type QueryInput, type RawQuery,
} from './query.js';
