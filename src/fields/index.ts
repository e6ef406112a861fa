/** Fields Bounded Context — Barrel Export */
import { rawField, stringField, intField, floatField, boolField } from './builtins.js';
import { defineFieldKind } from './FieldDescriptor.js';

/** Field factories: `field.int('age', { details: '...', min: 0 })`. */
export const field = {
    raw: rawField,
    string: stringField,
    int: intField,
    float: floatField,
    bool: boolField,
    custom: defineFieldKind,
} as const;

export {
    FieldDescriptor, defineFieldKind, defaultAccess, WHOLE_OBJECT,
    type FieldCoercion, type FieldSpec, type AttributeAccess, type FieldOptions,
    type FieldKind, type FieldDescription, type FieldFactory,
} from './FieldDescriptor.js';
export { zodFieldCoercion, type NumberFieldOptions, type BoolFieldOptions } from './builtins.js';
export {
    Serializer, createSerializer,
    type ObjectDict, type Representation, type ObjectValidator,
} from './Serializer.js';
