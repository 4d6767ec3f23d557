import { useCallback, useEffect, useMemo } from 'react';
import { View } from '@linked-views/core';
import { useStore } from '@tanstack/react-store';
import { useResolvedLinkGroup } from './use-selection-snapshot';
import type {
  ChartSpec,
  InteractionEvent,
  LinkGroup,
  RenderedArtifact,
} from '@linked-views/core';

export interface UseViewOptions {
  id?: string;
  linkGroup?: LinkGroup;
}

/**
 * Creates a view over the surrounding link group and keeps its artifact in
 * sync with the selection. The view is attached while the component is
 * mounted and replaced when the spec changes.
 */
export function useView(spec: ChartSpec, options: UseViewOptions = {}) {
  const group = useResolvedLinkGroup(options.linkGroup, 'useView');

  // Compare specs by content so inline literals do not recreate the view
  const specJson = JSON.stringify(spec);
  const view = useMemo(
    () => new View(spec, group.dataset, group, { id: options.id }),
    // eslint-disable-next-line react-hooks/exhaustive-deps
    [group, specJson, options.id],
  );

  useEffect(() => {
    group.attachView(view);
    return () => view.detach();
  }, [group, view]);

  const artifact = useViewArtifact(view, group);
  const interact = useCallback(
    (event: InteractionEvent) => view.onInteract(event),
    [view],
  );

  return { view, artifact, interact };
}

/**
 * The artifact of an existing view, re-rendered on every selection change.
 */
export function useViewArtifact(
  view: View,
  linkGroup?: LinkGroup,
): RenderedArtifact {
  const group = useResolvedLinkGroup(linkGroup, 'useViewArtifact');
  // Subscribing to the version is enough: render() is cached per version
  useStore(group.store, (state) => state.version);
  return view.render();
}
