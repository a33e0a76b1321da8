import { test } from 'node:test';
import assert from 'node:assert/strict';
import { createFinding } from '../core/findings.js';
import { analyze } from '../core/engine.js';
import { groupBySeverity, renderHtml, reportFilename, toCsv, toRows } from '../scripts/lib/report.js';

const missingAlt = createFinding('MissingAltText', 'images', { location: 'Image 1', elementSnippet: '<img src="a.png">' });
const clickable = createFinding('NonSemanticClickable', 'clickable-elements', {
  location: 'Clickable element 1',
  elementSnippet: '<div onclick="x()">d</div>',
  description: 'Clickable div element with issues: missing appropriate role, not keyboard accessible',
});
const caption = createFinding('TableWithoutCaption', 'tables', { location: 'Table 1', elementSnippet: '<table></table>' });

test('rows carry the six report columns', () => {
  assert.deepEqual(toRows([missingAlt]), [
    {
      Type: 'Missing Alt Text',
      Severity: 'High',
      Location: 'Image 1',
      Description: 'Image missing alt attribute',
      Impact: 'Screen readers cannot describe this image to users',
      Solution: 'Add descriptive alt text or alt="" for decorative images',
    },
  ]);
});

test('csv quotes commas and quotes', () => {
  const csv = toCsv(toRows([missingAlt, clickable]));
  assert.deepEqual(csv.split('\n'), [
    'Type,Severity,Location,Description,Impact,Solution',
    'Missing Alt Text,High,Image 1,Image missing alt attribute,Screen readers cannot describe this image to users,"Add descriptive alt text or alt="""" for decorative images"',
    'Non-semantic Clickable,High,Clickable element 1,"Clickable div element with issues: missing appropriate role, not keyboard accessible",Element not accessible via keyboard or screen readers,"Use button/a elements or add role=""button"" and tabindex=""0"""',
    '',
  ]);
  assert.equal(toCsv([]), 'Type,Severity,Location,Description,Impact,Solution\n');
});

test('filename embeds host and unix time', () => {
  const now = new Date(1_700_000_000_000);
  assert.equal(reportFilename('https://example.com/page', now), 'accessibility_report_example.com_1700000000.csv');
  assert.equal(reportFilename('http://localhost:8080/', now), 'accessibility_report_localhost:8080_1700000000.csv');
  assert.equal(reportFilename('about:blank', now), 'accessibility_report_local_1700000000.csv');
});

test('grouping keeps aggregate order inside each severity', () => {
  const groups = groupBySeverity([caption, missingAlt, clickable]);
  assert.deepEqual(Object.keys(groups), ['High', 'Medium', 'Low']);
  assert.deepEqual(groups.High, [missingAlt, clickable]);
  assert.deepEqual(groups.Medium, []);
  assert.deepEqual(groups.Low, [caption]);
});

test('html report escapes markup and counts severities', () => {
  const html = renderHtml(analyze('https://example.com', '<img src="a.png">'), new Date(0));
  assert.ok(html.includes('<b>Source:</b> https://example.com'));
  assert.ok(html.includes('High: 2'));
  assert.ok(html.includes('<code>&lt;img src=&quot;a.png&quot;&gt;</code>'));
  assert.ok(html.includes('<summary><b>Missing Alt Text</b> - Image 1</summary>'));
  assert.ok(html.includes('No medium priority issues found.'));
});

test('html report has an empty state', () => {
  const html = renderHtml(analyze('about:blank', '<h1>Fine</h1>'));
  assert.ok(html.includes('<p class="empty">No accessibility issues found.</p>'));
  assert.ok(!html.includes('<h2>All issues</h2>'));
});
