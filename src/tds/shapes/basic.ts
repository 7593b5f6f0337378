import { BOOL_FALSE, BOOL_TRUE } from '../format.js';
import { shape, type Shape } from '../shape.js';

export const BASIC_SHAPES: readonly Shape[] = [
    shape(BOOL_FALSE, 'bool_false', {}),
    shape(BOOL_TRUE, 'bool_true', {}),
    shape(0x3fedd339, 'true', {}),
    shape(0x56730bcc, 'null', {}),
];
