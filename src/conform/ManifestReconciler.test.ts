import { describe, it, expect } from 'vitest';
import { parseManifest, resolveLocation } from './ManifestReconciler';

const SAMPLE_MANIFEST = [
  'Xytech Workorder 1107',
  '',
  'Producer: Jane Doe',
  'Operator:   Sam Lee  ',
  'Job: Dune color correction',
  '',
  '/hpsans13/production/Dune/reel1/partA/1920x1080',
  '/hpsans12/production/Dune/reel1/VFX/Hydraulx',
  '',
  'Notes: Fix all frames marked',
];

describe('parseManifest', () => {
  it('MAN-001: extracts trimmed metadata values', () => {
    const { entry } = parseManifest(SAMPLE_MANIFEST);
    expect(entry.producer).toBe('Jane Doe');
    expect(entry.operator).toBe('Sam Lee');
    expect(entry.job).toBe('Dune color correction');
    expect(entry.notes).toBe('Fix all frames marked');
  });

  it('MAN-002: indexes location lines by stripped key', () => {
    const { locationMap } = parseManifest(SAMPLE_MANIFEST);
    expect(locationMap.get('/Dune/reel1/partA/1920x1080')).toBe('/hpsans13/production/Dune/reel1/partA/1920x1080');
    expect(locationMap.get('/Dune/reel1/VFX/Hydraulx')).toBe('/hpsans12/production/Dune/reel1/VFX/Hydraulx');
  });

  it('MAN-003: non-label, non-path lines still become locations', () => {
    const { locationMap } = parseManifest(SAMPLE_MANIFEST);
    expect(locationMap.get('Xytech Workorder 1107')).toBe('Xytech Workorder 1107');
    expect(locationMap.size).toBe(3);
  });

  it('MAN-004: a repeated key keeps the last full path', () => {
    const { entry, locationMap } = parseManifest([
      '/hpsans01/production/show/r1',
      '/hpsans02/production/show/r1',
    ]);
    expect(locationMap.get('/show/r1')).toBe('/hpsans02/production/show/r1');
    expect(entry.locations).toEqual([{ stripped: '/show/r1', full: '/hpsans02/production/show/r1' }]);
  });

  it('MAN-005: a label with no colon yields an empty value', () => {
    const { entry, locationMap } = parseManifest(['Producer', 'Operator Sam', 'Job:']);
    expect(entry.producer).toBe('');
    expect(entry.operator).toBe('');
    expect(entry.job).toBe('');
    expect(locationMap.size).toBe(0);
  });

  it('MAN-006: value keeps text after the first colon only', () => {
    const { entry } = parseManifest(['Job: reel 2: conform']);
    expect(entry.job).toBe('reel 2: conform');
  });

  it('MAN-007: missing metadata defaults to empty strings and no notes', () => {
    const { entry } = parseManifest(['/hpsans1/production/a']);
    expect(entry).toEqual({
      producer: '',
      operator: '',
      job: '',
      locations: [{ stripped: '/a', full: '/hpsans1/production/a' }],
    });
  });

  it('MAN-008: surrounding whitespace is trimmed from location lines', () => {
    const { locationMap } = parseManifest(['  /hpsans1/production/a  ']);
    expect(locationMap.get('/a')).toBe('/hpsans1/production/a');
  });
});

describe('resolveLocation', () => {
  const { locationMap } = parseManifest(['/hpsans01/production/shows/X/reel1']);

  it('MAN-009: resolves a storage-rooted path to the facility path', () => {
    expect(resolveLocation('/baselightfilesystem1/shows/X/reel1', locationMap)).toBe('/hpsans01/production/shows/X/reel1');
  });

  it('MAN-010: returns null for paths the manifest does not list', () => {
    expect(resolveLocation('/baselightfilesystem1/shows/Y/reel1', locationMap)).toBeNull();
    expect(resolveLocation('/otherfs/shows/X/reel1', locationMap)).toBeNull();
  });
});
