import { createRef } from 'react';
import { describe, expect, it, vi } from 'vitest';
import { act, fireEvent, render, screen } from '@testing-library/react';
import { HistoryInput, type HistoryInputHandle, type HistoryInputProps } from '@/components/completion/HistoryInput';
import { HistoryStoreProvider } from '@/components/completion/HistoryStoreProvider';
import { createHistoryStore, type PersistentHistoryStore } from '@/store/historyStore';
import { usePreferencesStore } from '@/store/preferencesStore';
import { createMemoryStorage } from '@/test/memoryStorage';

const renderHistoryInput = (
  props: Partial<HistoryInputProps> = {},
  store: PersistentHistoryStore = createHistoryStore({ name: 'test-history', storage: createMemoryStorage() })
) => {
  const ref = createRef<HistoryInputHandle>();
  const utils = render(
    <HistoryStoreProvider store={store}>
      <HistoryInput ref={ref} name="find" {...props} />
    </HistoryStoreProvider>
  );
  const input = screen.getByRole<HTMLInputElement>('combobox');
  return { ...utils, ref, store, input };
};

const typeAndCommit = (input: HTMLInputElement, value: string) => {
  fireEvent.change(input, { target: { value } });
  fireEvent.keyDown(input, { key: 'Enter' });
};

const optionTexts = () => screen.queryAllByRole('option').map((option) => option.textContent);

describe('HistoryInput', () => {
  it('records committed text most recent first without duplicates', () => {
    const onCommit = vi.fn();
    const { store, input } = renderHistoryInput({ onCommit });

    typeAndCommit(input, 'a');
    typeAndCommit(input, 'b');
    typeAndCommit(input, 'a');

    expect(store.get('find')).toEqual(['a', 'b']);
    expect(onCommit.mock.calls).toEqual([['a'], ['b'], ['a']]);
  });

  it('keeps at most maxHistory entries', () => {
    const { store, input } = renderHistoryInput({ maxHistory: 3 });

    for (const value of ['a', 'b', 'c', 'd']) typeAndCommit(input, value);

    expect(store.get('find')).toEqual(['d', 'c', 'b']);
  });

  it('keeps 100 entries by default', () => {
    const { ref, store } = renderHistoryInput();

    act(() => {
      for (let i = 0; i <= 100; i++) {
        ref.current?.setText(`q${i}`);
        ref.current?.commit();
      }
    });

    const history = store.get('find') ?? [];
    expect(history).toHaveLength(100);
    expect(history[0]).toBe('q100');
    expect(history[99]).toBe('q1');
  });

  it('keeps a field limit above the default across reloads', () => {
    const storage = createMemoryStorage();
    const { ref, unmount } = renderHistoryInput(
      { maxHistory: 150 },
      createHistoryStore({ name: 'test-history', storage })
    );

    act(() => {
      for (let i = 0; i < 150; i++) {
        ref.current?.setText(`q${i}`);
        ref.current?.commit();
      }
    });
    unmount();

    const history = createHistoryStore({ name: 'test-history', storage }).get('find') ?? [];
    expect(history).toHaveLength(150);
    expect(history[0]).toBe('q149');
    expect(history[149]).toBe('q0');
  });

  it('calls onCommit but leaves history alone for blank text', () => {
    const onCommit = vi.fn();
    const { store, input } = renderHistoryInput({ onCommit });

    typeAndCommit(input, '   ');

    expect(onCommit).toHaveBeenCalledWith('   ');
    expect(store.get('find')).toBeUndefined();
  });

  it('offers stored history as completions', () => {
    const store = createHistoryStore({ name: 'test-history', storage: createMemoryStorage() });
    store.set('find', ['alpha', 'beta', 'alpine']);
    const { input } = renderHistoryInput({}, store);

    fireEvent.change(input, { target: { value: 'al' } });

    expect(optionTexts()).toEqual(['alpha', 'alpine']);
  });

  it('offers newly committed text straight away', () => {
    const { input, ref } = renderHistoryInput();

    typeAndCommit(input, 'gamma');
    fireEvent.change(input, { target: { value: 'g' } });

    expect(optionTexts()).toEqual(['gamma']);
    expect(ref.current?.history).toEqual(['gamma']);
  });

  it('hides the popup when committing', () => {
    const { input } = renderHistoryInput();
    typeAndCommit(input, 'gamma');

    fireEvent.change(input, { target: { value: 'ga' } });
    expect(input.getAttribute('aria-expanded')).toBe('true');

    fireEvent.keyDown(input, { key: 'Enter' });
    expect(input.getAttribute('aria-expanded')).toBe('false');
  });

  it('clears history from the context menu', () => {
    const { store, input } = renderHistoryInput({ clearLabel: 'Clear search history' });
    typeAndCommit(input, 'gamma');

    fireEvent.contextMenu(input);
    fireEvent.click(screen.getByRole('menuitem', { name: 'Clear search history' }));

    expect(store.get('find')).toEqual([]);
    expect(screen.queryByRole('menu')).toBeNull();
    fireEvent.change(input, { target: { value: 'g' } });
    expect(optionTexts()).toEqual([]);
  });

  it('toggles completion from the context menu', () => {
    const store = createHistoryStore({ name: 'test-history', storage: createMemoryStorage() });
    store.set('find', ['alpha']);
    const { input } = renderHistoryInput({}, store);

    fireEvent.contextMenu(input);
    fireEvent.click(screen.getByRole('menuitem', { name: 'Disable completion based on history' }));

    expect(usePreferencesStore.getState().disabledCompletion).toEqual({ find: true });
    fireEvent.change(input, { target: { value: 'al' } });
    expect(input.getAttribute('aria-expanded')).toBe('false');

    fireEvent.contextMenu(input);
    fireEvent.click(screen.getByRole('menuitem', { name: 'Enable completion based on history' }));

    fireEvent.change(input, { target: { value: 'alp' } });
    expect(input.getAttribute('aria-expanded')).toBe('true');
  });

  it('closes the context menu on escape', () => {
    const { input } = renderHistoryInput();

    fireEvent.contextMenu(input);
    expect(screen.getByRole('menu')).not.toBeNull();

    fireEvent.keyDown(document, { key: 'Escape' });
    expect(screen.queryByRole('menu')).toBeNull();
  });

  it('clears history through its handle', () => {
    const { ref, store, input } = renderHistoryInput();
    typeAndCommit(input, 'gamma');

    act(() => ref.current?.clearHistory());

    expect(store.get('find')).toEqual([]);
    expect(ref.current?.history).toEqual([]);
  });

  it('opens the store while mounted', () => {
    const store = createHistoryStore({ name: 'test-history', storage: createMemoryStorage() });
    const open = vi.spyOn(store, 'open');
    const close = vi.spyOn(store, 'close');

    const { unmount } = renderHistoryInput({}, store);
    expect(open).toHaveBeenCalledTimes(1);
    expect(close).not.toHaveBeenCalled();

    unmount();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('requires a history store provider', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => render(<HistoryInput name="find" />)).toThrow(
      'useHistoryStore must be used within a HistoryStoreProvider'
    );

    vi.restoreAllMocks();
  });
});
