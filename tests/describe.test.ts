import assert from 'node:assert/strict';

import { describeStream, describeTrack, parseStreamTitle } from '../src/format/describe';

export function runDescribeTests() {
  assert.equal(
    describeTrack({ uri: 'local:track:one.mp3', name: 'One', artists: ['Alpha', 'Beta'], album: 'First' }),
    '{"title":"One","artist":"Alpha, Beta","album":"First","uri":"local:track:one.mp3"}',
  );

  assert.equal(
    describeTrack({ uri: 'file:///music/untitled.flac', artists: [] }),
    '{"title":"file:///music/untitled.flac","artist":"","album":"","uri":"file:///music/untitled.flac"}',
  );

  assert.deepEqual(parseStreamTitle('Some Band - Some Song'), {
    title: 'Some Song',
    artist: 'Some Band',
    album: '',
    uri: '',
  });
  assert.deepEqual(parseStreamTitle('News - Hour - Part 2'), {
    title: 'Hour - Part 2',
    artist: 'News',
    album: '',
    uri: '',
  });
  assert.equal(describeStream('Station Jingle'), '{"title":"Station Jingle","artist":"","album":"","uri":""}');
  assert.equal(describeStream('   '), '');
}
