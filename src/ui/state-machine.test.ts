import { describe, it, expect, beforeEach } from 'vitest';
import type { FileItem, ScanResult, Snapshot } from '../types.js';
import { MENU, StateMachine, type Action, type DeletionRequest, type Effect } from './state-machine.js';

function item(path: string, size: number, isDirectory = true): FileItem {
  return { path, name: path.split('/').pop() ?? path, size, isDirectory };
}

function category(name: string, items: FileItem[]): ScanResult {
  return { category: name, items, total: items.reduce((sum, i) => sum + i.size, 0) };
}

function snapshot(): Snapshot {
  const results = [
    category('Cache Files', [item('/h/Library/Caches/app', 100)]),
    category('Trash', [item('/h/.Trash/p1', 10, false), item('/h/.Trash/p2', 20, false), item('/h/.Trash/p3', 5, false)]),
  ];
  return {
    results: new Map(results.map((r) => [r.category, r])),
    grandTotal: 135,
  };
}

function press(machine: StateMachine, ...actions: Action[]): Effect[] {
  let effects: Effect[] = [];
  for (const action of actions) {
    effects = machine.dispatch({ type: 'key', action });
  }
  return effects;
}

/** Runs a full scan and opens the Trash category. */
function openTrash(machine: StateMachine): void {
  press(machine, 'select');
  machine.dispatch({ type: 'scan-complete', snapshot: snapshot() });
  press(machine, 'down', 'select');
}

function deletionFrom(effects: Effect[]): DeletionRequest {
  const effect = effects[0];
  if (effect?.type !== 'deleteOne' && effect?.type !== 'deleteMarked') {
    throw new Error(`expected a deletion effect, got ${effect?.type}`);
  }
  return effect.request;
}

describe('StateMachine', () => {
  let machine: StateMachine;

  beforeEach(() => {
    machine = new StateMachine();
  });

  describe('menu', () => {
    it('should offer the five menu entries', () => {
      expect(MENU.map((entry) => entry.label)).toEqual([
        '🔍 Full System Scan',
        '💻 Dev Scan (Development caches & artifacts)',
        '🚀 Quick Clean (Safe files only)',
        '📊 Disk Usage Report',
        '❌ Exit',
      ]);
    });

    it('should clamp the selection to the menu', () => {
      press(machine, 'up');
      expect(machine.menuIndex).toBe(0);
      press(machine, 'down', 'down', 'down', 'down', 'down', 'down');
      expect(machine.menuIndex).toBe(4);
    });

    it('should start the chosen scan profile', () => {
      const effects = press(machine, 'down', 'select');

      expect(effects).toEqual([{ type: 'scan', profile: 'dev' }]);
      expect(machine.state).toBe('scanning');
      expect(machine.scanInFlight).toBe(true);
    });

    it('should quit from the Exit entry and from q', () => {
      expect(press(machine, 'down', 'down', 'down', 'down', 'select')).toEqual([{ type: 'quit' }]);
      expect(new StateMachine().dispatch({ type: 'key', action: 'quit' })).toEqual([{ type: 'quit' }]);
    });
  });

  describe('scanning', () => {
    beforeEach(() => {
      press(machine, 'select');
    });

    it('should tally progress and keep the most recent paths', () => {
      const updates = Array.from({ length: 12 }, (_, i) => ({ category: 'Trash', path: `/h/.Trash/${i}`, size: 2 }));

      machine.dispatch({ type: 'scan-progress', updates });

      expect(machine.scanStats.found).toBe(12);
      expect(machine.scanStats.size).toBe(24);
      expect(machine.scanStats.recent).toHaveLength(10);
      expect(machine.scanStats.recent[9]).toBe('/h/.Trash/11');
    });

    it('should ignore keys other than quit', () => {
      expect(press(machine, 'cancel', 'select')).toEqual([]);
      expect(machine.state).toBe('scanning');
      expect(press(machine, 'quit')).toEqual([{ type: 'quit' }]);
    });

    it('should show results and refresh free space when the scan completes', () => {
      const effects = machine.dispatch({ type: 'scan-complete', snapshot: snapshot() });

      expect(effects).toEqual([{ type: 'diskSpace' }]);
      expect(machine.state).toBe('results');
      expect(machine.scanInFlight).toBe(false);
      expect(machine.view().grandTotal).toBe(135);
    });

    it('should return to the menu when the scan fails', () => {
      machine.dispatch({ type: 'scan-failed', error: 'boom' });

      expect(machine.state).toBe('menu');
      expect(machine.error).toBe('Scan failed: boom');
    });
  });

  describe('results', () => {
    beforeEach(() => {
      press(machine, 'select');
      machine.dispatch({ type: 'scan-complete', snapshot: snapshot() });
    });

    it('should open the selected category', () => {
      press(machine, 'down', 'select');

      expect(machine.state).toBe('detail');
      expect(machine.model.breadcrumb).toEqual(['Trash']);
    });

    it('should go back to the menu from the last row', () => {
      press(machine, 'down', 'down', 'down', 'select');

      expect(machine.state).toBe('menu');
    });

    it('should go back to the menu on cancel', () => {
      press(machine, 'cancel');

      expect(machine.state).toBe('menu');
    });

    it('should ask before cleaning a whole category', () => {
      const effects = press(machine, 'down', 'deleteSelected');

      expect(effects).toEqual([{ type: 'confirm', message: 'Permanently delete everything in Trash: 3 items (35 B)?' }]);
      expect(machine.view().awaitingConfirmation).toBe(true);
    });

    it('should stay on results after cleaning a whole category', () => {
      press(machine, 'down', 'deleteSelected');
      const request = deletionFrom(machine.dispatch({ type: 'confirm-result', accepted: true }));

      machine.dispatch({ type: 'deletion-complete', request, freed: 35, deletedPaths: ['/h/.Trash/p1', '/h/.Trash/p2', '/h/.Trash/p3'] });

      expect(machine.state).toBe('results');
      expect(machine.model.category('Trash')?.total).toBe(0);
      expect(machine.model.grandTotal).toBe(100);
    });
  });

  describe('detail', () => {
    beforeEach(() => {
      openTrash(machine);
    });

    it('should return to results when going up at the category root', () => {
      press(machine, 'back');

      expect(machine.state).toBe('results');
      expect(machine.model.activeCategory).toBeNull();
    });

    it('should return to the menu on cancel', () => {
      press(machine, 'cancel');

      expect(machine.state).toBe('menu');
    });

    it('should not explore a plain file', () => {
      expect(press(machine, 'select')).toEqual([]);
    });

    it('should explore directories asynchronously', () => {
      machine = new StateMachine();
      press(machine, 'select');
      machine.dispatch({ type: 'scan-complete', snapshot: snapshot() });
      press(machine, 'select');

      const effects = press(machine, 'select');
      expect(effects).toEqual([{ type: 'explore', category: 'Cache Files', path: '/h/Library/Caches/app', mode: 'push' }]);
      expect(machine.view().loading).toBe(true);

      machine.dispatch({
        type: 'explore-complete',
        category: 'Cache Files',
        path: '/h/Library/Caches/app',
        mode: 'push',
        items: [item('/h/Library/Caches/app/small', 1, false), item('/h/Library/Caches/app/big', 99)],
      });
      expect(machine.model.breadcrumb).toEqual(['Cache Files', 'app']);
      expect(machine.model.listing.map((i) => i.name)).toEqual(['big', 'small']);

      expect(press(machine, 'back')).toEqual([]);
      expect(machine.model.depth).toBe(1);
    });

    it('should show an error and keep the listing when exploring fails', () => {
      machine = new StateMachine();
      press(machine, 'select');
      machine.dispatch({ type: 'scan-complete', snapshot: snapshot() });
      press(machine, 'select', 'select');

      machine.dispatch({ type: 'explore-failed', category: 'Cache Files', path: '/h/Library/Caches/app', mode: 'push', error: 'EACCES' });

      expect(machine.error).toBe('Cannot open /h/Library/Caches/app: EACCES');
      expect(machine.model.loading).toBe(false);
      expect(machine.model.listing.map((i) => i.path)).toEqual(['/h/Library/Caches/app']);
    });

    it('should mark items with space and clear them with n', () => {
      press(machine, 'down', 'toggleMark');
      expect([...machine.model.marked]).toEqual(['/h/.Trash/p2']);

      press(machine, 'markAll');
      expect(machine.view().markedSize).toBe(35);

      press(machine, 'clearMarks');
      expect(machine.model.marked.size).toBe(0);
    });

    it('should do nothing on delete-marked with no marks', () => {
      expect(press(machine, 'deleteMarked')).toEqual([]);
      expect(machine.state).toBe('detail');
    });

    it('should confirm, delete and apply a marked batch', () => {
      press(machine, 'down', 'toggleMark');
      expect(press(machine, 'deleteMarked')).toEqual([{ type: 'confirm', message: 'Permanently delete 1 item (20 B)?' }]);

      const effects = machine.dispatch({ type: 'confirm-result', accepted: true });
      expect(machine.state).toBe('cleaning');
      const request = deletionFrom(effects);
      expect(request).toMatchObject({ kind: 'marked', category: 'Trash', paths: ['/h/.Trash/p2'] });

      const after = machine.dispatch({ type: 'deletion-complete', request, freed: 20, deletedPaths: ['/h/.Trash/p2'] });

      expect(after).toEqual([{ type: 'diskSpace' }]);
      expect(machine.state).toBe('detail');
      expect(machine.model.listing.map((i) => [i.path, i.size])).toEqual([
        ['/h/.Trash/p1', 10],
        ['/h/.Trash/p3', 5],
      ]);
      expect(machine.model.category('Trash')?.total).toBe(15);
      expect(machine.notice).toEqual({ kind: 'success', text: '✅ Deleted 1 item (20 B)' });
      expect(machine.view().freedTotal).toBe(20);
    });

    it('should keep everything when the confirmation is declined', () => {
      press(machine, 'deleteSelected');

      expect(machine.dispatch({ type: 'confirm-result', accepted: false })).toEqual([]);
      expect(machine.state).toBe('detail');
      expect(machine.notice).toEqual({ kind: 'info', text: 'Deletion cancelled' });
      expect(machine.model.listing).toHaveLength(3);
    });

    it('should ignore keys while waiting for confirmation', () => {
      press(machine, 'deleteSelected');

      expect(press(machine, 'down', 'cancel')).toEqual([]);
      expect(machine.state).toBe('detail');
      expect(machine.model.cursor).toBe(0);
    });
  });

  describe('without confirmation', () => {
    beforeEach(() => {
      machine = new StateMachine({ confirmDeletion: false });
      openTrash(machine);
    });

    it('should delete the selected item straight away', () => {
      const effects = press(machine, 'deleteSelected');

      expect(effects).toEqual([
        {
          type: 'deleteOne',
          request: {
            kind: 'one',
            category: 'Trash',
            origin: 'detail',
            item: item('/h/.Trash/p1', 10, false),
            listing: machine.model.listing,
          },
        },
      ]);
      expect(machine.view().cleaningLabel).toBe('p1 (10 B)');
    });

    it('should let cancel leave the cleaning screen while the deletion finishes', () => {
      const request = deletionFrom(press(machine, 'deleteSelected'));

      press(machine, 'cancel');
      expect(machine.state).toBe('menu');

      machine.dispatch({ type: 'deletion-complete', request, freed: 10, deletedPaths: ['/h/.Trash/p1'] });
      expect(machine.state).toBe('menu');
      expect(machine.model.category('Trash')?.items.map((i) => i.path)).toEqual(['/h/.Trash/p2', '/h/.Trash/p3']);
      expect(machine.model.freedTotal).toBe(10);
    });

    it('should show an error when a single deletion fails', () => {
      const request = deletionFrom(press(machine, 'deleteSelected'));

      machine.dispatch({ type: 'deletion-failed', request, error: 'EPERM' });

      expect(machine.state).toBe('detail');
      expect(machine.error).toBe('Failed to delete /h/.Trash/p1: EPERM');
      expect(machine.model.listing).toHaveLength(3);
      expect(machine.model.freedTotal).toBe(0);
    });

    it('should refuse a new scan while a deletion is running', () => {
      press(machine, 'deleteSelected', 'cancel');

      expect(press(machine, 'select')).toEqual([]);
      expect(machine.state).toBe('menu');
      expect(machine.notice).toEqual({ kind: 'info', text: 'Wait for the running operation to finish first' });
    });
  });

  describe('disk usage report', () => {
    const rows = [
      { filesystem: '/dev/sda1', size: '50G', used: '20G', avail: '28G', capacity: '42%', mountedOn: '/' },
      { filesystem: 'tmpfs', size: '2.0G', used: '0', avail: '2.0G', capacity: '0%', mountedOn: '/dev/shm' },
    ];

    beforeEach(() => {
      machine.menuIndex = 3;
    });

    it('should request the report and show it', () => {
      expect(press(machine, 'select')).toEqual([{ type: 'diskUsage' }]);
      expect(machine.view().diskUsageLoading).toBe(true);

      machine.dispatch({ type: 'disk-usage-complete', rows });

      expect(machine.state).toBe('diskUsageReport');
      expect(machine.view().diskUsage).toEqual(rows);
    });

    it('should treat quit as going back to the menu', () => {
      press(machine, 'select');
      machine.dispatch({ type: 'disk-usage-complete', rows });

      expect(press(machine, 'down', 'down')).toEqual([]);
      expect(machine.reportIndex).toBe(1);
      expect(press(machine, 'quit')).toEqual([]);
      expect(machine.state).toBe('menu');
    });

    it('should go back to the menu with an error when df fails', () => {
      press(machine, 'select');

      machine.dispatch({ type: 'disk-usage-failed', error: 'no disk usage data' });

      expect(machine.state).toBe('menu');
      expect(machine.error).toBe('Disk usage report failed: no disk usage data');
    });
  });

  describe('paging', () => {
    it('should move the cursor by a screenful', () => {
      const items = Array.from({ length: 40 }, (_, i) => item(`/h/.Trash/f${i}`, 100 - i, false));
      press(machine, 'select');
      machine.dispatch({
        type: 'scan-complete',
        snapshot: { results: new Map([['Trash', category('Trash', items)]]), grandTotal: 0 },
      });
      press(machine, 'select');
      machine.dispatch({ type: 'resize', width: 100, height: 30 });

      press(machine, 'pageDown');
      expect(machine.model.cursor).toBe(15);
      press(machine, 'pageDown', 'pageDown');
      expect(machine.model.cursor).toBe(39);
      press(machine, 'pageUp');
      expect(machine.model.cursor).toBe(24);
    });
  });
});
