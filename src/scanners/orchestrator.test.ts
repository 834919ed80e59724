import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { CategoryProbe, FileItem, ProbeId, ScanResult } from '../types.js';
import { resetLogSink, setLogSink } from '../utils/index.js';
import { ScanAccumulator, runScan } from './orchestrator.js';
import { SCAN_PROFILES, getProfileProbes } from './index.js';

function item(path: string, size: number): FileItem {
  return { path, name: path.split('/').pop() ?? path, size, isDirectory: true };
}

function fakeProbe(id: ProbeId, category: string, items: FileItem[], delayMs = 0): CategoryProbe {
  return {
    id,
    category,
    scan: () =>
      new Promise<ScanResult>((resolve) => {
        setTimeout(() => resolve({ category, items, total: items.reduce((sum, i) => sum + i.size, 0) }), delayMs);
      }),
  };
}

describe('orchestrator', () => {
  const logged: string[] = [];

  beforeEach(() => {
    logged.length = 0;
    setLogSink((line) => logged.push(line));
  });

  afterEach(() => {
    resetLogSink();
  });

  describe('runScan', () => {
    it('should merge every probe into one snapshot', async () => {
      const snapshot = await runScan(
        [
          fakeProbe('trash', 'Trash', [item('/h/.Trash/a', 10), item('/h/.Trash/b', 20)], 15),
          fakeProbe('log-files', 'Log Files', [item('/h/Library/Logs/x.log', 5)]),
        ],
        { homeDir: '/h' }
      );

      expect([...snapshot.results.keys()].sort()).toEqual(['Log Files', 'Trash']);
      expect(snapshot.results.get('Trash')?.total).toBe(30);
      expect(snapshot.grandTotal).toBe(35);
    });

    it('should drop categories that found nothing', async () => {
      const snapshot = await runScan(
        [fakeProbe('trash', 'Trash', []), fakeProbe('cocoapods', 'CocoaPods', [item('/h/pods', 7)])],
        { homeDir: '/h' }
      );

      expect([...snapshot.results.keys()]).toEqual(['CocoaPods']);
      expect(snapshot.grandTotal).toBe(7);
    });

    it('should produce the same snapshot whatever order probes finish in', async () => {
      const a = [item('/h/a', 1)];
      const b = [item('/h/b', 2)];

      const first = await runScan([fakeProbe('trash', 'Trash', a, 20), fakeProbe('cocoapods', 'CocoaPods', b, 0)], { homeDir: '/h' });
      const second = await runScan([fakeProbe('trash', 'Trash', a, 0), fakeProbe('cocoapods', 'CocoaPods', b, 20)], { homeDir: '/h' });

      expect(second.results).toEqual(first.results);
      expect(second.grandTotal).toBe(first.grandTotal);
    });

    it('should treat a rejecting probe as having found nothing', async () => {
      const broken: CategoryProbe = {
        id: 'docker-artifacts',
        category: 'Docker Artifacts',
        scan: () => Promise.reject(new Error('EACCES')),
      };

      const snapshot = await runScan([broken, fakeProbe('trash', 'Trash', [item('/h/t', 3)])], { homeDir: '/h' });

      expect([...snapshot.results.keys()]).toEqual(['Trash']);
      expect(logged).toContain('[Scanner] Docker Artifacts failed: EACCES');
    });

    it('should report each finished probe', async () => {
      const finished: string[] = [];

      await runScan([fakeProbe('trash', 'Trash', [item('/h/t', 3)])], {
        homeDir: '/h',
        onProbeComplete: (probe, result) => finished.push(`${probe.id}:${result.total}`),
      });

      expect(finished).toEqual(['trash:3']);
    });

    it('should return an empty snapshot for no probes', async () => {
      const snapshot = await runScan([], { homeDir: '/h' });

      expect(snapshot.results.size).toBe(0);
      expect(snapshot.grandTotal).toBe(0);
    });
  });

  describe('ScanAccumulator', () => {
    it('should filter ignored paths, folders and categories before totalling', () => {
      const accumulator = new ScanAccumulator({
        ignoredPaths: ['/h/keep.iso'],
        ignoredFolders: ['/h/projects'],
        ignoredCategories: ['Trash'],
      });

      accumulator.add({ category: 'Trash', items: [item('/h/.Trash/x', 5)], total: 5 });
      accumulator.add({
        category: 'Old Downloads',
        items: [item('/h/keep.iso', 100), item('/h/projects/app/node_modules', 50), item('/h/projects-old', 9), item('/h/other', 1)],
        total: 160,
      });

      const snapshot = accumulator.toSnapshot();
      expect([...snapshot.results.keys()]).toEqual(['Old Downloads']);
      expect(snapshot.results.get('Old Downloads')?.items.map((i) => i.path)).toEqual(['/h/projects-old', '/h/other']);
      expect(snapshot.grandTotal).toBe(10);
    });
  });

  describe('profiles', () => {
    it('should resolve every profile to distinct probes', () => {
      for (const profile of ['full', 'dev', 'quick'] as const) {
        const probes = getProfileProbes(profile);
        expect(probes.map((probe) => probe.id)).toEqual(SCAN_PROFILES[profile]);
        expect(new Set(probes.map((probe) => probe.category)).size).toBe(probes.length);
      }
    });

    it('should keep the quick clean to safe categories', () => {
      expect(getProfileProbes('quick').map((probe) => probe.category)).toEqual([
        'Cache Files',
        'Log Files',
        'Trash',
        'Homebrew Cache',
      ]);
    });
  });
});
