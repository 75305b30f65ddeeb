import { describe, expect, test } from "vitest";
import {
  addMember,
  cascade,
  copyMember,
  defineGroup,
  defineLink,
  defineScript,
  defineStyle,
  groupResources,
  removeMember,
  ResourceError,
} from "../core";

describe("Resource Groups - Membership", () => {
  test("appends members in order and sets the back reference", () => {
    const group = defineGroup({ uid: "g" });
    const first = defineScript({ uid: "first", file: "first.js" });
    const second = defineStyle({ uid: "second", file: "second.css" });

    addMember(group, first);
    addMember(group, second);

    expect(group.members).toEqual([first, second]);
    expect(first.group).toBe(group);
    expect(second.group).toBe(group);
  });

  test("adds initial members through defineGroup", () => {
    const resource = defineScript({ uid: "r", file: "r.js" });
    const group = defineGroup({ uid: "g", members: [resource] });

    expect(group.members[0]).toBe(resource);
    expect(resource.group).toBe(group);
  });

  test("rejects a member that already belongs to another group", () => {
    const resource = defineScript({ uid: "r", file: "r.js" });
    defineGroup({ uid: "a", members: [resource] });
    const other = defineGroup({ uid: "b" });

    expect(() => addMember(other, resource)).toThrow(
      'script resource "r" already belongs to group "a"'
    );
  });

  test("rejects adding a group to itself or to a descendant", () => {
    const outer = defineGroup({ uid: "outer" });
    const inner = defineGroup({ uid: "inner" });
    addMember(outer, inner);

    expect(() => addMember(outer, outer)).toThrow(ResourceError);
    expect(() => addMember(inner, outer)).toThrow(
      'Adding group "outer" to "inner" would make it contain itself'
    );
  });

  test("removes a member and clears its back reference", () => {
    const keep = defineScript({ uid: "keep", file: "keep.js" });
    const drop = defineScript({ uid: "drop", file: "drop.js" });
    const group = defineGroup({ uid: "g", members: [keep, drop] });

    removeMember(drop);

    expect(group.members).toEqual([keep]);
    expect(drop.group).toBeUndefined();

    // free to join another group now
    const other = defineGroup({ uid: "other", members: [drop] });
    expect(drop.group).toBe(other);
  });

  test("removing an unattached member fails", () => {
    const lonely = defineScript({ uid: "lonely", file: "lonely.js" });

    expect(() => removeMember(lonely)).toThrow(
      'script resource "lonely" is no member of a group'
    );
  });

  test("refuses to remove a member its group does not list", () => {
    const first = defineScript({ uid: "first", file: "first.js" });
    const last = defineScript({ uid: "last", file: "last.js" });
    const group = defineGroup({ uid: "g", members: [first, last] });
    const stray = defineScript({ uid: "stray", file: "stray.js" });
    stray.group = group;

    expect(() => removeMember(stray)).toThrow(
      'script resource "stray" is not listed in group "g"'
    );
    expect(group.members).toEqual([first, last]);
  });

  test("adds resources and groups to the group passed at definition", () => {
    const outer = defineGroup({ uid: "outer" });
    const inner = defineGroup({ uid: "inner", group: outer });
    const script = defineScript({ uid: "js", file: "app.js", group: inner });
    const style = defineStyle({ uid: "css", file: "app.css", group: outer });
    const link = defineLink({ uid: "icon", file: "icon.png", group: outer });

    expect(outer.members).toEqual([inner, style, link]);
    expect(inner.members).toEqual([script]);
    expect(script.group).toBe(inner);
    expect(inner.group).toBe(outer);
    expect(link.group).toBe(outer);
  });

  test("requires a non-empty uid", () => {
    expect(() => defineGroup({ uid: "" })).toThrow(
      "A resource group needs a non-empty uid"
    );
  });
});

describe("Resource Groups - Queries", () => {
  test("lists contained resources including nested groups, optionally by kind", () => {
    const script = defineScript({ uid: "js", file: "app.js" });
    const style = defineStyle({ uid: "css", file: "app.css" });
    const link = defineLink({ uid: "icon", file: "icon.png", rel: "icon" });
    const nestedScript = defineScript({ uid: "nested", file: "nested.js" });
    const nested = defineGroup({ uid: "nested-group", members: [nestedScript] });
    const group = defineGroup({ uid: "g", members: [script, style, nested, link] });

    expect(groupResources(group)).toEqual([script, style, nestedScript, link]);
    expect(groupResources(group, "script")).toEqual([script, nestedScript]);
    expect(groupResources(group, "style")).toEqual([style]);
    expect(groupResources(group, "link")).toEqual([link]);
  });

  test("cascade takes the innermost explicit value", () => {
    const resource = defineScript({ uid: "r", file: "r.js" });
    const inner = defineGroup({ uid: "inner", members: [resource] });
    const outer = defineGroup({ uid: "outer", path: "outer", directory: "/d", members: [inner] });

    expect(cascade(resource, "path")).toBe("outer");
    inner.path = "inner";
    expect(cascade(resource, "path")).toBe("inner");
    resource.path = "own";
    expect(cascade(resource, "path")).toBe("own");
    expect(cascade(inner, "directory")).toBe("/d");
    expect(cascade(outer, "path")).toBe("outer");
  });
});

describe("Resource Groups - Copies", () => {
  test("copies a resource without its group", () => {
    const group = defineGroup({ uid: "g" });
    const original = defineScript({
      uid: "app",
      file: "app.js",
      depends: "lib",
      attrs: { "data-role": "main" },
      group,
    });

    const copy = copyMember(original);
    copy.file = "app-legacy.js";

    expect(copy).not.toBe(original);
    expect(copy.kind).toBe("script");
    expect(copy.uid).toBe("app");
    expect(copy.depends).toEqual(["lib"]);
    expect(copy.depends).not.toBe(original.depends);
    expect(copy.attrs).toEqual({ "data-role": "main" });
    expect(copy.attrs).not.toBe(original.attrs);
    expect(copy.group).toBeUndefined();
    expect(original.file).toBe("app.js");
    expect(group.members).toEqual([original]);
  });

  test("copies a group subtree with fresh back references", () => {
    const lib = defineScript({ uid: "lib", file: "lib.js" });
    const inner = defineGroup({ uid: "inner", path: "vendor", members: [lib] });
    const app = defineScript({ uid: "app", file: "app.js" });
    const outer = defineGroup({ uid: "outer", directory: "/srv", members: [inner, app] });
    const root = defineGroup({ uid: "root", members: [outer] });

    const copy = copyMember(outer);

    expect(copy.group).toBeUndefined();
    expect(copy.uid).toBe("outer");
    expect(copy.directory).toBe("/srv");
    expect(copy.skip).toBe(outer.skip);
    expect(copy.members).toHaveLength(2);

    const [innerCopy, appCopy] = copy.members;
    expect(innerCopy).not.toBe(inner);
    expect(appCopy).not.toBe(app);
    expect(innerCopy.group).toBe(copy);
    expect(appCopy.group).toBe(copy);
    expect(groupResources(copy).map((resource) => resource.uid)).toEqual(["lib", "app"]);
    expect(groupResources(copy)[0]).not.toBe(lib);
    expect(groupResources(copy)[0].group).toBe(innerCopy);

    // the original tree is untouched
    expect(root.members).toEqual([outer]);
    expect(outer.members).toEqual([inner, app]);
    expect(lib.group).toBe(inner);

    addMember(root, copy);
    expect(root.members).toEqual([outer, copy]);
  });
});
