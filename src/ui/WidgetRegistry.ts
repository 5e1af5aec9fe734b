/**
 * Widget Registry
 *
 * Instance table for every live widget: kind, model, parent/children,
 * enabled and focus flags. Routes canonical events to the addressed
 * instance and applies container consequences (tab exclusivity, dropdown
 * option selection, radio groups, tooltip owner hover, scroll bubbling).
 *
 * Changes are collected rather than reported: ids whose style may have
 * changed go to a dirty set, value changes and clicks to a notification
 * queue. The frame driver drains both once per frame.
 */

import type { WidgetEvent, WidgetEventType, WidgetId } from "./events";
import { WidgetError, widgetNotFound } from "./errors";
import type {
  CreateOptions,
  Notification,
  SetValueResult,
  VisualState,
  WidgetKind,
  WidgetModel,
  WidgetValue,
} from "./types";
import {
  applyEvent,
  canHost,
  createModel,
  isFocusableKind,
  resetModel,
  showsChildren,
  valueOf,
  visualOf,
} from "./widgets/dispatch";
import { isActivationKey } from "./widgets/interaction";
import { setChecked } from "./widgets/Checkbox";
import { setSliderTrack, setSliderValue, type SliderTrack } from "./widgets/Slider";
import {
  addOption,
  clampSelection,
  closeDropdown,
  highlightOption,
  removeOption,
  selectOption,
} from "./widgets/Dropdown";
import { advanceTooltip, isTooltipShown, tooltipOwnerEvent } from "./widgets/Tooltip";
import { setScrollExtents, setScrollOffset } from "./widgets/Scrollable";
import { activeIndexAfterRemoval, setTabActive, stepTabIndex } from "./widgets/TabContainer";
import { setCollapsed } from "./widgets/Panel";
import { progressText, setProgress } from "./widgets/ProgressBar";

/** Creation-option callbacks, normalized to one shape per notification type */
export interface WidgetHandlers {
  onClick: ((id: WidgetId) => void) | null;
  onChange: ((value: WidgetValue, id: WidgetId) => void) | null;
  onScroll: ((offset: number, id: WidgetId) => void) | null;
}

export interface WidgetRecord {
  readonly id: WidgetId;
  readonly kind: WidgetKind;
  parent: WidgetId | null;
  children: WidgetId[];
  /** Own flag; see isEffectivelyEnabled for the inherited one */
  enabled: boolean;
  focused: boolean;
  baseStyle: string;
  label: string;
  model: WidgetModel;
  handlers: WidgetHandlers;
}

/** Events that start an interaction; hidden widgets ignore these */
const STARTING_EVENTS: ReadonlySet<WidgetEventType> = new Set([
  "pointerEnter",
  "pointerDown",
  "pointerMove",
  "scroll",
  "keyPress",
]);

/** Owner events a tooltip child reacts to */
const TOOLTIP_OWNER_EVENTS: ReadonlySet<WidgetEventType> = new Set([
  "pointerEnter",
  "pointerLeave",
  "pointerDown",
]);

function handlersFor(options: CreateOptions): WidgetHandlers {
  const handlers: WidgetHandlers = { onClick: null, onChange: null, onScroll: null };
  switch (options.kind) {
    case "button":
      handlers.onClick = options.onClick ?? null;
      break;
    case "checkbox": {
      const onChange = options.onChange;
      if (onChange) {
        handlers.onChange = (value, id) => {
          if (typeof value === "boolean") onChange(value, id);
        };
      }
      break;
    }
    case "slider":
    case "tabContainer": {
      const onChange = options.onChange;
      if (onChange) {
        handlers.onChange = (value, id) => {
          if (typeof value === "number") onChange(value, id);
        };
      }
      break;
    }
    case "dropdown": {
      const onChange = options.onChange;
      if (onChange) {
        handlers.onChange = (value, id) => {
          if (typeof value !== "boolean") onChange(value, id);
        };
      }
      break;
    }
    case "scrollable":
      handlers.onScroll = options.onScroll ?? null;
      break;
    default:
      break;
  }
  return handlers;
}

/**
 * Owns widget instances and their composition.
 */
export class WidgetRegistry {
  private records = new Map<WidgetId, WidgetRecord>();
  private roots: WidgetId[] = [];
  private counter = 0;

  private dirty = new Set<WidgetId>();
  private notifications: Notification[] = [];
  private destroyed: WidgetId[] = [];

  // ---- Lookup ----

  has(id: WidgetId): boolean {
    return this.records.has(id);
  }

  /** @throws WidgetError NotFound */
  get(id: WidgetId): WidgetRecord {
    const record = this.records.get(id);
    if (!record) throw widgetNotFound(id);
    return record;
  }

  /** Live ids in creation order */
  ids(): WidgetId[] {
    return [...this.records.keys()];
  }

  get size(): number {
    return this.records.size;
  }

  getChildren(id: WidgetId): WidgetId[] {
    return [...this.get(id).children];
  }

  getParent(id: WidgetId): WidgetId | null {
    return this.get(id).parent;
  }

  /** Enabled itself and under no disabled ancestor */
  isEffectivelyEnabled(id: WidgetId): boolean {
    let record = this.records.get(id);
    while (record) {
      if (!record.enabled) return false;
      record = record.parent === null ? undefined : this.records.get(record.parent);
    }
    return true;
  }

  /**
   * Whether the widget is shown. A tooltip is shown once its delay elapsed,
   * whatever its owner's own children gate says; every other widget needs
   * each ancestor to show its children.
   */
  isVisible(id: WidgetId): boolean {
    const record = this.get(id);
    if (record.model.kind === "tooltip") {
      if (!isTooltipShown(record.model)) return false;
      return record.parent === null || this.isVisible(record.parent);
    }

    let current = record;
    while (current.parent !== null) {
      const parent = this.records.get(current.parent);
      if (!parent) break;
      if (!showsChildren(parent.model)) return false;
      current = parent;
    }
    return true;
  }

  getVisualState(id: WidgetId): VisualState {
    const record = this.get(id);
    return visualOf(record.model, this.isEffectivelyEnabled(id), record.focused);
  }

  /** Content text the host renders for the widget */
  textOf(id: WidgetId): string {
    const record = this.get(id);
    const model = record.model;
    switch (model.kind) {
      case "tooltip":
        return model.text;
      case "progressBar":
        return model.showText ? progressText(model) : record.label;
      case "panel":
        return model.title ?? record.label;
      case "dropdown": {
        if (model.selected === null) return record.label;
        const optionId = this.optionIds(record)[model.selected];
        return optionId === undefined ? record.label : this.get(optionId).label;
      }
      default:
        return record.label;
    }
  }

  /** Whether a widget can hold keyboard focus right now */
  canFocus(id: WidgetId): boolean {
    const record = this.records.get(id);
    if (!record || !isFocusableKind(record.kind)) return false;
    return this.isEffectivelyEnabled(id) && this.isVisible(id);
  }

  /**
   * Next focusable widget in tree order, wrapping at either end.
   */
  nextFocusable(current: WidgetId | null, backwards: boolean): WidgetId | null {
    const order = this.treeOrder().filter((id) => this.canFocus(id));
    if (order.length === 0) return null;

    const index = current === null ? -1 : order.indexOf(current);
    if (index < 0) return (backwards ? order[order.length - 1] : order[0]) ?? null;
    const step = backwards ? -1 : 1;
    return order[(index + step + order.length) % order.length] ?? null;
  }

  // ---- Lifecycle ----

  /**
   * Create a widget under `options.parent` (or as a root).
   *
   * @throws WidgetError NotFound for an unknown parent, InvalidParent when
   * the parent cannot host the kind
   */
  create(options: CreateOptions): WidgetId {
    const parentId = options.parent ?? null;
    const parent = parentId === null ? null : this.records.get(parentId);
    if (parentId !== null && !parent) throw widgetNotFound(parentId);

    const parentKind = parent ? parent.kind : null;
    if (!canHost(parentKind, options.kind)) {
      throw new WidgetError(
        "InvalidParent",
        `A ${options.kind} cannot be placed under ${parent ? `${parentKind} "${parent.id}"` : "the root"}`,
        parentId
      );
    }

    const record = this.insert(options, parent ?? null);

    if (options.kind === "dropdown") {
      for (const label of options.options ?? []) {
        this.insert({ kind: "button", label }, record);
      }
    }

    if (parent) {
      if (parent.model.kind === "tabContainer" && record.kind === "tab" && parent.model.activeIndex < 0) {
        this.activateTab(parent, 0, false);
      }
      if (parent.model.kind === "dropdown" && record.kind === "button") {
        this.commit(parent, addOption(parent.model));
      }
    }

    if (record.model.kind === "checkbox" && record.model.variant === "radio" && record.model.checked) {
      this.uncheckRadioSiblings(record);
    }

    return record.id;
  }

  /**
   * Remove a widget and its subtree, fixing up the parent's aggregate.
   *
   * @returns Removed ids, parent before children
   */
  destroy(id: WidgetId): WidgetId[] {
    const record = this.get(id);
    const removed = this.subtree(id);

    const parent = record.parent === null ? null : this.records.get(record.parent);
    if (parent) {
      this.detachFromParent(record, parent);
    } else {
      this.roots = this.roots.filter((rootId) => rootId !== id);
    }

    for (const removedId of removed) {
      this.records.delete(removedId);
      this.dirty.delete(removedId);
      this.destroyed.push(removedId);
    }
    return removed;
  }

  /**
   * Enable or disable a widget. Disabling cancels every in-flight gesture
   * in the subtree; a reverted slider drag is announced as a value change.
   */
  setEnabled(id: WidgetId, enabled: boolean): void {
    const record = this.get(id);
    if (record.enabled === enabled) return;
    record.enabled = enabled;

    if (!enabled) {
      for (const descendantId of this.subtree(id)) {
        const descendant = this.get(descendantId);
        const outcome = resetModel(descendant.model);
        this.commit(descendant, outcome.model);
        if (outcome.valueChanged) this.notifyValue(descendant);
      }
    }
    this.markSubtreeDirty(id);
  }

  /**
   * Programmatic assignment. Clamps into the widget's bounds; the change
   * itself is not announced, knock-on changes to other widgets are.
   *
   * @throws WidgetError InvalidArgument when the kind has no value or the
   * value has the wrong type
   */
  setValue(id: WidgetId, requested: WidgetValue): SetValueResult {
    const record = this.get(id);
    const model = record.model;
    const mismatch = (expected: string): WidgetError =>
      new WidgetError(
        "InvalidArgument",
        `A ${record.kind} value must be ${expected}, got ${JSON.stringify(requested)}`,
        id
      );

    let clamped = false;
    switch (model.kind) {
      case "checkbox":
        if (typeof requested !== "boolean") throw mismatch("a boolean");
        this.commit(record, setChecked(model, requested));
        if (requested && model.variant === "radio") this.uncheckRadioSiblings(record);
        break;

      case "panel":
        if (typeof requested !== "boolean") throw mismatch("a boolean");
        if (requested && !model.collapsible) {
          throw new WidgetError("InvalidArgument", `Panel "${id}" is not collapsible`, id);
        }
        this.commit(record, setCollapsed(model, requested));
        break;

      case "slider": {
        if (typeof requested !== "number") throw mismatch("a number");
        const result = setSliderValue(model, requested);
        clamped = result.clamped;
        this.commit(record, result.model);
        break;
      }

      case "scrollable": {
        if (typeof requested !== "number") throw mismatch("a number");
        const result = setScrollOffset(model, requested);
        clamped = result.clamped;
        this.commit(record, result.model);
        break;
      }

      case "progressBar": {
        if (typeof requested !== "number") throw mismatch("a number");
        const result = setProgress(model, requested);
        clamped = result.clamped;
        this.commit(record, result.model);
        break;
      }

      case "dropdown": {
        if (typeof requested === "boolean") throw mismatch("an option index or null");
        const selection = clampSelection(requested, model.optionCount);
        clamped = selection.clamped;
        if (selection.value !== model.selected) {
          this.commit(record, { ...model, selected: selection.value });
        }
        break;
      }

      case "tabContainer": {
        if (typeof requested !== "number") throw mismatch("a tab index");
        const count = this.tabIds(record).length;
        if (count === 0) {
          clamped = requested !== -1;
          break;
        }
        const selection = clampSelection(requested, count);
        clamped = selection.clamped;
        this.activateTab(record, selection.value ?? 0, false);
        break;
      }

      case "button":
      case "tooltip":
      case "tab":
        throw new WidgetError("InvalidArgument", `A ${record.kind} has no value`, id);
    }

    const value = valueOf(record.model);
    return { value: value === undefined ? null : value, requested, clamped };
  }

  /** @throws WidgetError InvalidArgument for kinds without a value */
  getValue(id: WidgetId): WidgetValue {
    const record = this.get(id);
    const value = valueOf(record.model);
    if (value === undefined) {
      throw new WidgetError("InvalidArgument", `A ${record.kind} has no value`, id);
    }
    return value;
  }

  setSliderTrack(id: WidgetId, track: SliderTrack): void {
    const record = this.get(id);
    if (record.model.kind !== "slider") {
      throw new WidgetError("InvalidArgument", `Widget "${id}" is not a slider`, id);
    }
    this.commit(record, setSliderTrack(record.model, track));
  }

  /** Host layout changed the extents; re-clamping the offset is announced */
  setScrollExtents(id: WidgetId, contentExtent: number, viewportExtent: number): void {
    const record = this.get(id);
    if (record.model.kind !== "scrollable") {
      throw new WidgetError("InvalidArgument", `Widget "${id}" is not a scrollable`, id);
    }
    const outcome = setScrollExtents(record.model, contentExtent, viewportExtent);
    this.commit(record, outcome.model);
    if (outcome.valueChanged) this.notifyValue(record);
  }

  setLabel(id: WidgetId, label: string): void {
    const record = this.get(id);
    if (record.label === label) return;
    record.label = label;
    this.dirty.add(id);
    // A dropdown header shows its selected option's label
    if (record.parent !== null) this.dirty.add(record.parent);
  }

  // ---- Frame processing ----

  /**
   * Apply one canonical event. Events for unknown ids are dropped.
   */
  dispatch(event: WidgetEvent): void {
    const addressed = this.records.get(event.target);
    if (!addressed) return;

    if (event.type === "focusGained" || event.type === "focusLost") {
      const focused = event.type === "focusGained";
      if (addressed.focused !== focused) {
        addressed.focused = focused;
        this.dirty.add(addressed.id);
      }
      return;
    }

    let record = addressed;
    let routed = event;
    if (event.type === "scroll") {
      const scroller = this.nearestScrollable(addressed);
      if (scroller) {
        record = scroller;
        routed = { ...event, target: scroller.id };
      }
    } else if (event.type === "keyPress" && !isActivationKey(event)) {
      // List navigation belongs to the dropdown even while an option holds focus
      const list = this.openDropdownOf(addressed);
      if (list) {
        record = list;
        routed = { ...event, target: list.id };
      }
    }

    if (!this.isEffectivelyEnabled(record.id)) return;
    if (STARTING_EVENTS.has(routed.type) && !this.isVisible(record.id)) return;

    const outcome = applyEvent(record.model, routed);
    this.commit(record, outcome.model);

    if (TOOLTIP_OWNER_EVENTS.has(routed.type)) this.forwardToTooltips(record, routed);

    if (outcome.clicked) this.onClicked(record);
    if (outcome.valueChanged) this.onValueChanged(record);
    if (outcome.siblingStep !== undefined) this.stepSibling(record, outcome.siblingStep);

    if (routed.type === "pointerEnter" && record.kind === "button") {
      const parent = this.parentOf(record);
      if (parent && parent.model.kind === "dropdown") {
        const index = this.optionIds(parent).indexOf(record.id);
        this.commit(parent, highlightOption(parent.model, index));
      }
    }
  }

  /**
   * A primary press landed on `hit`: close every open dropdown it is not
   * inside of.
   */
  dismissOutside(hit: WidgetId | null): void {
    for (const record of this.records.values()) {
      if (record.model.kind !== "dropdown" || !record.model.isOpen) continue;
      if (hit !== null && this.isSelfOrDescendant(hit, record.id)) continue;
      this.commit(record, closeDropdown(record.model));
    }
  }

  /** Advance pending tooltips by one frame */
  advanceTimers(deltaTime: number): void {
    for (const record of this.records.values()) {
      if (record.model.kind !== "tooltip") continue;
      if (!this.isEffectivelyEnabled(record.id)) continue;
      this.commit(record, advanceTooltip(record.model, deltaTime));
    }
  }

  /** Mark every widget using a base style for re-resolution */
  markStyleDirty(name: string): void {
    for (const record of this.records.values()) {
      if (record.baseStyle === name) this.dirty.add(record.id);
    }
  }

  takeDirty(): WidgetId[] {
    const ids = [...this.dirty];
    this.dirty.clear();
    return ids;
  }

  takeNotifications(): Notification[] {
    const notifications = this.notifications;
    this.notifications = [];
    return notifications;
  }

  takeDestroyed(): WidgetId[] {
    const destroyed = this.destroyed;
    this.destroyed = [];
    return destroyed;
  }

  // ---- Consistency ----

  /**
   * Verify the table. A failure is a defect in the registry, never a
   * recoverable condition.
   */
  checkIntegrity(): void {
    const fail = (message: string): never => {
      throw new Error(`[WidgetRegistry] Integrity violation: ${message}`);
    };

    for (const root of this.roots) {
      const record = this.records.get(root);
      if (!record) fail(`root "${root}" does not exist`);
      else if (record.parent !== null) fail(`root "${root}" has parent "${record.parent}"`);
    }

    for (const record of this.records.values()) {
      if (record.model.kind !== record.kind) {
        fail(`"${record.id}" is a ${record.kind} holding a ${record.model.kind} model`);
      }

      const parent = record.parent === null ? null : this.records.get(record.parent);
      if (record.parent !== null && !parent) {
        fail(`"${record.id}" references missing parent "${record.parent}"`);
      }
      if (parent && !parent.children.includes(record.id)) {
        fail(`"${record.id}" is missing from the children of "${parent.id}"`);
      }
      if (record.parent === null && !this.roots.includes(record.id)) {
        fail(`"${record.id}" has no parent and is not a root`);
      }
      if (!canHost(parent ? parent.kind : null, record.kind)) {
        fail(`"${record.id}" cannot be hosted by its parent`);
      }
      if (new Set(record.children).size !== record.children.length) {
        fail(`"${record.id}" lists a child twice`);
      }
      for (const childId of record.children) {
        const child = this.records.get(childId);
        if (!child) fail(`"${record.id}" references missing child "${childId}"`);
        else if (child.parent !== record.id) fail(`child "${childId}" does not point back to "${record.id}"`);
      }

      this.checkAggregate(record, fail);
    }
  }

  // ---- Internals ----

  private insert(options: CreateOptions, parent: WidgetRecord | null): WidgetRecord {
    const id = `${options.kind}-${++this.counter}`;
    const record: WidgetRecord = {
      id,
      kind: options.kind,
      parent: parent ? parent.id : null,
      children: [],
      enabled: options.enabled ?? true,
      focused: false,
      baseStyle: options.baseStyle ?? options.kind,
      label: options.label ?? "",
      model: createModel(options),
      handlers: handlersFor(options),
    };
    this.records.set(id, record);
    if (parent) {
      parent.children.push(id);
    } else {
      this.roots.push(id);
    }
    this.dirty.add(id);
    return record;
  }

  /**
   * Store a new model. When the widget starts or stops showing its
   * children, their visibility changed too.
   */
  private commit(record: WidgetRecord, model: WidgetModel): void {
    if (model === record.model) return;
    const gateChanged = showsChildren(model) !== showsChildren(record.model);
    record.model = model;
    this.dirty.add(record.id);
    if (gateChanged) this.markSubtreeDirty(record.id);
  }

  private notifyValue(record: WidgetRecord): void {
    const value = valueOf(record.model);
    if (value === undefined) return;
    if (record.model.kind === "scrollable") {
      this.notifications.push({ type: "scrollChanged", id: record.id, offset: record.model.offset });
      return;
    }
    this.notifications.push({ type: "valueChanged", id: record.id, kind: record.kind, value });
  }

  private onClicked(record: WidgetRecord): void {
    const parent = this.parentOf(record);

    if (record.kind === "button") {
      this.notifications.push({ type: "click", id: record.id });
      if (parent && parent.model.kind === "dropdown") {
        const index = this.optionIds(parent).indexOf(record.id);
        const outcome = selectOption(parent.model, index);
        this.commit(parent, outcome.model);
        if (outcome.valueChanged) this.notifyValue(parent);
      }
      return;
    }

    if (record.kind === "tab" && parent) {
      this.activateTab(parent, this.tabIds(parent).indexOf(record.id), true);
    }
  }

  private onValueChanged(record: WidgetRecord): void {
    this.notifyValue(record);
    if (record.model.kind === "checkbox" && record.model.variant === "radio" && record.model.checked) {
      this.uncheckRadioSiblings(record);
    }
  }

  private stepSibling(record: WidgetRecord, step: -1 | 1): void {
    const parent = this.parentOf(record);
    if (!parent || parent.model.kind !== "tabContainer") return;
    const tabs = this.tabIds(parent);
    const target = stepTabIndex(tabs.indexOf(record.id), tabs.length, step);
    this.activateTab(parent, target, true);
  }

  /**
   * Make the tab at `index` the only active one and store the index on the
   * container.
   */
  private activateTab(container: WidgetRecord, index: number, notify: boolean): void {
    if (container.model.kind !== "tabContainer") return;
    const tabs = this.tabIds(container);
    if (index < 0 || index >= tabs.length) return;

    tabs.forEach((tabId, i) => {
      const tab = this.get(tabId);
      if (tab.model.kind === "tab") this.commit(tab, setTabActive(tab.model, i === index));
    });

    if (container.model.activeIndex === index) return;
    this.commit(container, { ...container.model, activeIndex: index });
    if (notify) this.notifyValue(container);
  }

  private uncheckRadioSiblings(record: WidgetRecord): void {
    const siblings = record.parent === null ? this.roots : this.get(record.parent).children;
    for (const siblingId of siblings) {
      if (siblingId === record.id) continue;
      const sibling = this.get(siblingId);
      const model = sibling.model;
      if (model.kind !== "checkbox" || model.variant !== "radio" || !model.checked) continue;
      this.commit(sibling, setChecked(model, false));
      this.notifyValue(sibling);
    }
  }

  private forwardToTooltips(owner: WidgetRecord, event: WidgetEvent): void {
    for (const childId of owner.children) {
      const child = this.get(childId);
      if (child.model.kind !== "tooltip") continue;
      if (!this.isEffectivelyEnabled(childId)) continue;
      this.commit(child, tooltipOwnerEvent(child.model, event).model);
    }
  }

  private detachFromParent(record: WidgetRecord, parent: WidgetRecord): void {
    if (parent.model.kind === "tabContainer" && record.kind === "tab") {
      const tabs = this.tabIds(parent);
      const removedIndex = tabs.indexOf(record.id);
      const wasActive = removedIndex === parent.model.activeIndex;
      const nextIndex = activeIndexAfterRemoval(parent.model.activeIndex, removedIndex, tabs.length);

      parent.children = parent.children.filter((childId) => childId !== record.id);
      const changed = nextIndex !== parent.model.activeIndex;
      this.commit(parent, { ...parent.model, activeIndex: -1 });
      if (nextIndex >= 0) this.activateTab(parent, nextIndex, false);
      if (changed || wasActive) this.notifyValue(parent);
      return;
    }

    if (parent.model.kind === "dropdown" && record.kind === "button") {
      const removedIndex = this.optionIds(parent).indexOf(record.id);
      parent.children = parent.children.filter((childId) => childId !== record.id);
      const outcome = removeOption(parent.model, removedIndex);
      this.commit(parent, outcome.model);
      if (outcome.valueChanged) this.notifyValue(parent);
      return;
    }

    parent.children = parent.children.filter((childId) => childId !== record.id);
    this.dirty.add(parent.id);
  }

  private checkAggregate(record: WidgetRecord, fail: (message: string) => never): void {
    const model = record.model;
    if (model.kind === "tabContainer") {
      const tabs = this.tabIds(record);
      const active = tabs.filter((tabId) => {
        const tab = this.records.get(tabId);
        return tab !== undefined && tab.model.kind === "tab" && tab.model.isActive;
      });
      if (tabs.length === 0 && model.activeIndex !== -1) {
        fail(`"${record.id}" has no tabs but active index ${model.activeIndex}`);
      }
      if (tabs.length > 0 && (active.length !== 1 || tabs[model.activeIndex] !== active[0])) {
        fail(`"${record.id}" does not have exactly one active tab at index ${model.activeIndex}`);
      }
    }
    if (model.kind === "dropdown") {
      const count = this.optionIds(record).length;
      if (model.optionCount !== count) {
        fail(`"${record.id}" counts ${model.optionCount} options but has ${count}`);
      }
      if (model.selected !== null && (model.selected < 0 || model.selected >= count)) {
        fail(`"${record.id}" selects missing option ${model.selected}`);
      }
    }
    if (model.kind === "slider" && (model.value < model.min || model.value > model.max)) {
      fail(`"${record.id}" holds ${model.value} outside [${model.min}, ${model.max}]`);
    }
    if (model.kind === "scrollable") {
      const max = Math.max(0, model.contentExtent - model.viewportExtent);
      if (model.offset < 0 || model.offset > max) {
        fail(`"${record.id}" is scrolled to ${model.offset} outside [0, ${max}]`);
      }
    }
    if (model.kind === "progressBar" && (model.value < 0 || model.value > 1)) {
      fail(`"${record.id}" holds progress ${model.value} outside [0, 1]`);
    }
  }

  private parentOf(record: WidgetRecord): WidgetRecord | null {
    if (record.parent === null) return null;
    return this.records.get(record.parent) ?? null;
  }

  private childrenOfKind(record: WidgetRecord, kind: WidgetKind): WidgetId[] {
    return record.children.filter((childId) => this.records.get(childId)?.kind === kind);
  }

  private optionIds(dropdown: WidgetRecord): WidgetId[] {
    return this.childrenOfKind(dropdown, "button");
  }

  private tabIds(container: WidgetRecord): WidgetId[] {
    return this.childrenOfKind(container, "tab");
  }

  private nearestScrollable(record: WidgetRecord): WidgetRecord | null {
    let current: WidgetRecord | null = record;
    while (current) {
      if (current.kind === "scrollable") return current;
      current = this.parentOf(current);
    }
    return null;
  }

  /** The open dropdown a button is an option of */
  private openDropdownOf(record: WidgetRecord): WidgetRecord | null {
    if (record.kind !== "button") return null;
    const parent = this.parentOf(record);
    if (!parent || parent.model.kind !== "dropdown" || !parent.model.isOpen) return null;
    return parent;
  }

  private isSelfOrDescendant(id: WidgetId, ancestor: WidgetId): boolean {
    let current = this.records.get(id);
    while (current) {
      if (current.id === ancestor) return true;
      current = current.parent === null ? undefined : this.records.get(current.parent);
    }
    return false;
  }

  /** Ids of the subtree rooted at `id`, parent before children */
  private subtree(id: WidgetId): WidgetId[] {
    const result: WidgetId[] = [];
    const stack = [id];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      result.push(current);
      const record = this.records.get(current);
      if (record) stack.push(...[...record.children].reverse());
    }
    return result;
  }

  private treeOrder(): WidgetId[] {
    return this.roots.flatMap((root) => this.subtree(root));
  }

  private markSubtreeDirty(id: WidgetId): void {
    for (const descendantId of this.subtree(id)) this.dirty.add(descendantId);
  }
}
