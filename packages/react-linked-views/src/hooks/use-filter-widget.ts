import { useCallback, useEffect, useMemo, useState } from 'react';
import {
  CheckboxFilter,
  RangeSliderFilter,
  SelectFilter,
  TextFilter,
} from '@linked-views/core';
import { useResolvedLinkGroup } from './use-selection-snapshot';
import type { DependencyList } from 'react';
import type {
  CheckboxFilterConfig,
  FilterWidget,
  FilterWidgetConfig,
  LinkGroup,
  SelectFilterConfig,
  TextFilterConfig,
} from '@linked-views/core';

type AnyFilterWidget = FilterWidget<unknown, unknown>;

/**
 * Creates a widget over the surrounding link group. It is attached while the
 * component is mounted and replaced when `deps` change.
 *
 * Returns the widget and its control model, refreshed on every value or
 * selection change.
 */
export function useFilterWidget<TWidget extends AnyFilterWidget, TControl>(
  factory: (linkGroup: LinkGroup) => TWidget,
  renderControl: (widget: TWidget) => TControl,
  deps: DependencyList,
  linkGroup?: LinkGroup,
) {
  const group = useResolvedLinkGroup(linkGroup, 'useFilterWidget');

  // 1. Instantiate the widget (no side effects during render)
  const widget = useMemo(
    () => factory(group),
    // eslint-disable-next-line react-hooks/exhaustive-deps
    [group, ...deps],
  );

  // 2. Attach/Detach lifecycle
  useEffect(() => {
    group.attachWidget(widget);
    // A value kept across a detach is written again
    const value = widget.getValue();
    if (value !== null) {
      widget.apply(value);
    }
    return () => widget.detach();
  }, [group, widget]);

  // 3. Track the control model
  const [control, setControl] = useState<TControl>(() =>
    renderControl(widget),
  );

  useEffect(() => {
    setControl(renderControl(widget));
    return widget.subscribe(() => setControl(renderControl(widget)));
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [widget]);

  const setValue = useCallback(
    (value: Parameters<TWidget['setValue']>[0]) => widget.setValue(value),
    [widget],
  );

  return { widget, control, setValue };
}

export function useCheckboxFilter(
  config: CheckboxFilterConfig,
  linkGroup?: LinkGroup,
) {
  const { column, id, label, debounceTime, sortMode } = config;
  return useFilterWidget(
    (group) =>
      new CheckboxFilter(group, { column, id, label, debounceTime, sortMode }),
    (widget) => widget.renderControl(),
    [column, id, label, debounceTime, sortMode],
    linkGroup,
  );
}

export function useRangeSliderFilter(
  config: FilterWidgetConfig,
  linkGroup?: LinkGroup,
) {
  const { column, id, label, debounceTime } = config;
  return useFilterWidget(
    (group) =>
      new RangeSliderFilter(group, { column, id, label, debounceTime }),
    (widget) => widget.renderControl(),
    [column, id, label, debounceTime],
    linkGroup,
  );
}

export function useSelectFilter(
  config: SelectFilterConfig,
  linkGroup?: LinkGroup,
) {
  const { column, id, label, debounceTime, sortMode } = config;
  return useFilterWidget(
    (group) =>
      new SelectFilter(group, { column, id, label, debounceTime, sortMode }),
    (widget) => widget.renderControl(),
    [column, id, label, debounceTime, sortMode],
    linkGroup,
  );
}

export function useTextFilter(config: TextFilterConfig, linkGroup?: LinkGroup) {
  const { column, id, label, debounceTime, caseSensitive } = config;
  return useFilterWidget(
    (group) =>
      new TextFilter(group, { column, id, label, debounceTime, caseSensitive }),
    (widget) => widget.renderControl(),
    [column, id, label, debounceTime, caseSensitive],
    linkGroup,
  );
}
