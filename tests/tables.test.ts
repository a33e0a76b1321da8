import { test } from 'node:test';
import assert from 'node:assert/strict';
import tables from '../modules/tables/index.js';
import { kinds, runCheck } from './helpers.js';

test('headers without caption → only TableWithoutCaption', () => {
  const findings = runCheck(tables, '<table><tr><th>H</th></tr><tr><td>1</td></tr></table>');
  assert.deepEqual(kinds(findings), ['TableWithoutCaption']);
  assert.equal(findings[0].severity, 'Low');
  assert.equal(findings[0].location, 'Table 1');
});

test('caption without headers', () => {
  const findings = runCheck(tables, '<table><caption>C</caption><tr><td>1</td></tr></table>');
  assert.deepEqual(kinds(findings), ['TableWithoutHeaders']);
  assert.equal(findings[0].severity, 'Medium');
});

test('bare table fires both', () => {
  assert.deepEqual(kinds(runCheck(tables, '<table><tr><td>1</td></tr></table>')), ['TableWithoutHeaders', 'TableWithoutCaption']);
});

test('th inside thead counts', () => {
  assert.deepEqual(runCheck(tables, '<table><caption>C</caption><thead><tr><th>H</th></tr></thead></table>'), []);
});

test('caption must be a direct child', () => {
  const findings = runCheck(
    tables,
    '<table><tr><td><table><caption>Inner</caption><tr><th>x</th></tr></table></td></tr></table>',
  );
  assert.deepEqual(findings.map((f) => [f.kind, f.location]), [['TableWithoutCaption', 'Table 1']]);
});
