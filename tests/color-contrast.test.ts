import { test } from 'node:test';
import assert from 'node:assert/strict';
import contrast, { hasCompetingColors } from '../modules/color-contrast/index.js';
import { runCheck } from './helpers.js';

test('color plus background is flagged', () => {
  const findings = runCheck(contrast, '<p style="color: red; background: white">t</p>');
  assert.equal(findings.length, 1);
  assert.equal(findings[0].kind, 'PotentialContrastIssue');
  assert.equal(findings[0].severity, 'Medium');
  assert.equal(findings[0].location, 'Styled element 1');
});

test('index counts every styled element', () => {
  const findings = runCheck(contrast, '<p style="margin:0">a</p><p style="color:#000;background:#fff">b</p>');
  assert.deepEqual(findings.map((f) => f.location), ['Styled element 2']);
});

test('substring heuristic', () => {
  assert.equal(hasCompetingColors('color:red'), false);
  assert.equal(hasCompetingColors('background: blue'), false);
  // background-color: contains color:
  assert.equal(hasCompetingColors('background-color: blue'), true);
  assert.equal(hasCompetingColors('COLOR: red; BACKGROUND: x'), false);
});

test('elements without style are not inspected', () => {
  assert.deepEqual(runCheck(contrast, '<p class="color: red background">t</p>'), []);
});
