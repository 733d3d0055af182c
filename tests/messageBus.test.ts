import assert from 'node:assert/strict';

import { matchesTopic } from '../src/bus/messageBus';

export function runMatchesTopicTests() {
  assert.equal(matchesTopic('mopidy/c/+', 'mopidy/c/plb'), true);
  assert.equal(matchesTopic('mopidy/c/+', 'mopidy/c/plb/extra'), false);
  assert.equal(matchesTopic('mopidy/c/+', 'mopidy/i/sta'), false);
  assert.equal(matchesTopic('mopidy/#', 'mopidy/i/sta'), true);
  assert.equal(matchesTopic('mopidy/#', 'mopidy'), true);
  assert.equal(matchesTopic('mopidy/c/plb', 'mopidy/c/plb'), true);
  assert.equal(matchesTopic('mopidy/c/plb', 'mopidy/c'), false);
}
