import { createContext, useContext, useEffect, useMemo, useRef } from 'react';
import { ActiveFilterRegistry } from '@linked-views/core';
import { useStore } from '@tanstack/react-store';
import type { ReactNode } from 'react';
import type {
  ActiveFilter,
  FilterGroupConfig,
  LinkGroup,
  LinkGroupRegistration,
} from '@linked-views/core';

const FilterContext = createContext<ActiveFilterRegistry | null>(null);

/**
 * Provider component for the active filter registry.
 * Initializes a new registry instance with the given display groups.
 */
export function FilterRegistryProvider({
  groups,
  children,
}: {
  groups?: Array<FilterGroupConfig>;
  children: ReactNode;
}) {
  const registry = useMemo(() => new ActiveFilterRegistry(), []);

  useEffect(() => {
    groups?.forEach((group) => registry.registerGroup(group));
  }, [registry, groups]);

  return (
    <FilterContext.Provider value={registry}>{children}</FilterContext.Provider>
  );
}

/**
 * Hook to access the filter registry instance.
 */
export function useFilterRegistry() {
  const ctx = useContext(FilterContext);
  if (!ctx) {
    throw new Error(
      'useFilterRegistry must be used within FilterRegistryProvider',
    );
  }
  return ctx;
}

/**
 * Hook to subscribe to the list of active filters.
 */
export function useActiveFilters(): Array<ActiveFilter> {
  const registry = useFilterRegistry();
  const state = useStore(registry.store);
  return state.filters;
}

type RegistrationMetadata = Omit<LinkGroupRegistration, 'groupId'>;

/**
 * Registers a LinkGroup with the surrounding registry, if any.
 * Unregisters on unmount.
 *
 * Labels are compared by content and formatters by identity, so pass
 * formatters that are stable across renders.
 */
export function useRegisterLinkGroup(
  linkGroup: LinkGroup | null | undefined,
  groupId: string,
  metadata?: RegistrationMetadata,
) {
  const ctx = useContext(FilterContext);
  const memoMetadata = useStableMetadata(metadata);

  useEffect(() => {
    if (!ctx || !linkGroup) {
      return;
    }
    ctx.register(linkGroup, { groupId, ...memoMetadata });
    return () => ctx.unregister(linkGroup);
  }, [ctx, linkGroup, groupId, memoMetadata]);
}

function useStableMetadata(metadata: RegistrationMetadata | undefined) {
  const ref = useRef(metadata);
  if (!sameMetadata(ref.current, metadata)) {
    ref.current = metadata;
  }
  return ref.current;
}

function sameMetadata(
  a: RegistrationMetadata | undefined,
  b: RegistrationMetadata | undefined,
): boolean {
  if (a === b) {
    return true;
  }
  if (!a || !b) {
    return false;
  }
  return (
    JSON.stringify(a.labelMap ?? {}) === JSON.stringify(b.labelMap ?? {}) &&
    sameEntries(a.formatterMap ?? {}, b.formatterMap ?? {})
  );
}

function sameEntries(
  a: Record<string, unknown>,
  b: Record<string, unknown>,
): boolean {
  const keys = Object.keys(a);
  return (
    keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key])
  );
}
