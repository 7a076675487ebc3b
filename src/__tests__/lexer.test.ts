import { describe, it, expect } from 'vitest'
import { LexFailure } from '../errors.js'
import { Lexer, tokenize } from '../lexer.js'
import {
  ADD,
  LEFT_PAREN,
  MULTIPLY,
  POWER,
  RIGHT_PAREN,
  SUBTRACT,
  identifier,
  literal
} from '../token.js'

function catchError (fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }

  throw new Error('Expected an error')
}

describe('Lexer', () => {
  it('splits a simple sum', () => {
    expect(tokenize('3 + 4')).toEqual([literal(3n), ADD, literal(4n)])
  })

  it('reads tokens without separating whitespace', () => {
    expect(tokenize('(x^2)*y')).toEqual([
      LEFT_PAREN,
      identifier('x'),
      POWER,
      literal(2n),
      RIGHT_PAREN,
      MULTIPLY,
      identifier('y')
    ])
  })

  it('collapses an even run of minus signs into an add', () => {
    expect(tokenize('5 - - 3')).toEqual([literal(5n), ADD, literal(3n)])
    expect(tokenize('5 --3')).toEqual([literal(5n), ADD, literal(3n)])
  })

  it('keeps an odd run of minus signs as a subtraction', () => {
    expect(tokenize('5 - - - 3')).toEqual([literal(5n), SUBTRACT, literal(3n)])
    expect(tokenize('5 ---3')).toEqual([literal(5n), SUBTRACT, literal(3n)])
  })

  it('collapses a run of plus signs', () => {
    expect(tokenize('1 +++ 2')).toEqual([literal(1n), ADD, literal(2n)])
  })

  it('reads a leading sign as an operator', () => {
    expect(tokenize('-5')).toEqual([SUBTRACT, literal(5n)])
  })

  it('keeps literals beyond 64 bits exact', () => {
    expect(tokenize('123456789012345678901234567890')).toEqual([
      literal(123456789012345678901234567890n)
    ])
  })

  it('returns nothing for whitespace', () => {
    expect(tokenize('   ')).toEqual([])
  })

  it('rejects an operand running into a word character', () => {
    const error = catchError(() => tokenize('12x + 1'))

    expect(error).toBeInstanceOf(LexFailure)
    expect(error).toMatchObject({ index: 0, message: 'Invalid expression' })

    expect(() => tokenize('ab1')).toThrow(LexFailure)
  })

  it('rejects an operator followed by another operator', () => {
    const error = catchError(() => tokenize('2 * -3'))

    expect(error).toBeInstanceOf(LexFailure)
    expect(error).toMatchObject({ index: 2 })
  })

  it('points at the unmatched fragment', () => {
    expect(catchError(() => tokenize('1 + 2 $'))).toMatchObject({ index: 6 })
  })

  it('checks for the end without moving', () => {
    const lexer = new Lexer('  7  ')

    expect(lexer.exhausted).toBe(false)
    expect(lexer.index).toBe(0)
    expect(lexer.readToken()).toEqual(literal(7n))
    expect(lexer.exhausted).toBe(true)
    expect(lexer.readToken()).toBeUndefined()
  })

  it('hands out tokens one at a time', () => {
    const lexer = new Lexer('1 + 2 $')

    expect(lexer.readToken()).toEqual(literal(1n))
    expect(lexer.readToken()).toBe(ADD)
    expect(lexer.index).toBe(4)
    expect(lexer.readToken()).toEqual(literal(2n))
    expect(() => lexer.readToken()).toThrow(LexFailure)
  })
})
