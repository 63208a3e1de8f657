/**
 * Argument checks used by the fluent setters.
 * Each check throws before anything is assigned, so a rejected call leaves the
 * instance as it was.
 */

import { invalidArgument, nullArgument } from '../errors/codes'
import { isNullish, type Maybe } from '../types'
import { CoreValidators } from './patterns'

export type ElementCheck<T> = (value: unknown, field: string) => T

export function checkNotNull<T>(value: Maybe<T>, field: string): T {
    if (isNullish(value)) {
        throw nullArgument(field)
    }
    return value
}

export function checkString(value: unknown, field: string): string {
    const checked = checkNotNull(value, field)
    if (typeof checked !== 'string') {
        throw invalidArgument(field, 'must be a string', checked)
    }
    return checked
}

export function checkNonEmptyString(value: unknown, field: string): string {
    const checked = checkString(value, field)
    if (!CoreValidators.isNonEmptyString(checked)) {
        throw invalidArgument(field, 'must not be empty', checked)
    }
    return checked
}

export function checkInteger(value: unknown, field: string): number {
    const checked = checkNotNull(value, field)
    if (typeof checked !== 'number' || !Number.isInteger(checked)) {
        throw invalidArgument(field, 'must be an integer', checked)
    }
    return checked
}

export function checkPositiveInteger(value: unknown, field: string): number {
    const checked = checkInteger(value, field)
    if (!CoreValidators.isPositiveInteger(checked)) {
        throw invalidArgument(field, 'must be a positive integer', checked)
    }
    return checked
}

function isIterable(value: unknown): value is Iterable<unknown> {
    return typeof value === 'object' && value !== null && Symbol.iterator in value
}

/**
 * Resolves the arguments of a setter offering both `(sequence)` and
 * `(...elements)` forms to the sequence being set.
 */
export function sequenceArgument(args: readonly unknown[], field: string): Iterable<unknown> {
    const [first] = args
    if (args.length === 1) {
        if (isNullish(first)) {
            throw nullArgument(field)
        }
        if (isIterable(first)) {
            return first
        }
    }
    return args
}

function checkElements<T>(values: Maybe<Iterable<unknown>>, field: string, checkElement: ElementCheck<T>): T[] {
    const checked: T[] = []
    for (const element of checkNotNull(values, field)) {
        if (isNullish(element)) {
            throw invalidArgument(field, 'elements must not be null', element)
        }
        checked.push(checkElement(element, field))
    }
    return checked
}

/**
 * Copies a sequence into a frozen array after checking every element.
 * Rejects a nullish or empty sequence and nullish elements.
 */
export function checkList<T>(values: Maybe<Iterable<unknown>>, field: string, checkElement: ElementCheck<T>): readonly T[] {
    const checked = checkElements(values, field, checkElement)
    if (checked.length === 0) {
        throw invalidArgument(field, 'must not be empty', checked)
    }
    return Object.freeze(checked)
}

/**
 * Like {@link checkList} but keeps the first occurrence of each element only,
 * and accepts an empty sequence.
 */
export function checkUniqueList<T>(values: Maybe<Iterable<unknown>>, field: string, checkElement: ElementCheck<T>): readonly T[] {
    return Object.freeze([...new Set(checkElements(values, field, checkElement))])
}
