import test from 'ava'
import {UnresolvedVariableError} from '../../errors.js'
import {referencedVariables, substitute, substituteAll} from '../template.js'

// -- substitute --------------------------------------------------------------

test('substitute: replaces markers from the scope', t => {
  t.is(substitute('%(output)s/bin', {output: '/work/out'}), '/work/out/bin')
})

test('substitute: replaces several markers in one string', t => {
  const scope = {cc: 'clang', flags: '-O2'}
  t.is(substitute('CC=%(cc)s %(flags)s', scope), 'CC=clang -O2')
})

test('substitute: %% is a literal percent sign', t => {
  t.is(substitute('100%% of %(what)s', {what: 'cores'}), '100% of cores')
})

test('substitute: lone percent sign is kept', t => {
  t.is(substitute('50% done', {}), '50% done')
})

test('substitute: string without markers is returned unchanged', t => {
  t.is(substitute('make install', {output: '/x'}), 'make install')
})

test('substitute: does not expand markers inside substituted values', t => {
  const scope = {a: '%(b)s', b: 'never'}
  t.is(substitute('value=%(a)s', scope), 'value=%(b)s')
})

test('substitute: unbound marker throws UnresolvedVariableError', t => {
  const error = t.throws(() => substitute('-L%(abs_libcxx)s/lib', {output: '/x'}), {instanceOf: UnresolvedVariableError})
  t.is(error?.variable, 'abs_libcxx')
  t.is(error?.template, '-L%(abs_libcxx)s/lib')
})

test('substitute: inherited object keys are not treated as bindings', t => {
  t.throws(() => substitute('%(constructor)s', {}), {instanceOf: UnresolvedVariableError})
})

test('substitute: empty value is a valid binding', t => {
  t.is(substitute('[%(empty)s]', {empty: ''}), '[]')
})

// -- substituteAll -----------------------------------------------------------

test('substituteAll: expands every argument', t => {
  const argv = substituteAll(['make', '-j%(cores)s', 'DESTDIR=%(abs_output)s'], {cores: '8', abs_output: '/w/out'})
  t.deepEqual(argv, ['make', '-j8', 'DESTDIR=/w/out'])
})

// -- referencedVariables -----------------------------------------------------

test('referencedVariables: lists unique names in order of appearance', t => {
  t.deepEqual(referencedVariables('%(b)s %(a)s %(b)s %%(c)s'), ['b', 'a'])
})

test('referencedVariables: none for plain strings', t => {
  t.deepEqual(referencedVariables('plain'), [])
})
