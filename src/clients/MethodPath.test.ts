import { expect, vi } from "vitest";
import { UsageError } from "../errors/rpc.js";
import { kwargs, notification } from "./KeywordArguments.js";
import { type Dispatch, MethodPath } from "./MethodPath.js";

const setup = () => {
  const dispatch = vi.fn<Dispatch>(async () => "ok");
  return { dispatch, root: MethodPath.root(dispatch) };
};

test("joins segments in access order", () => {
  const { root } = setup();
  const path = root.descend("app").descend("users").descend("getUsers");

  expect(path.name).toBe("app.users.getUsers");
  expect(path.segments).toEqual(["app", "users", "getUsers"]);
  expect(root.isRoot).toBe(true);
  expect(path.isRoot).toBe(false);
});

test("descending leaves the original path untouched", () => {
  const { root } = setup();
  const app = root.descend("app");
  const left = app.descend("left");
  const right = app.descend("right");

  expect(app.name).toBe("app");
  expect(left.name).toBe("app.left");
  expect(right.name).toBe("app.right");
});

test("has no depth limit", () => {
  const { root } = setup();
  let path = root;
  for (let depth = 0; depth < 500; depth++) {
    path = path.descend("level");
  }

  expect(path.segments).toHaveLength(500);
  expect(path.name.startsWith("level.level.")).toBe(true);
});

test("dispatches the dotted name with positional arguments", async () => {
  const { root, dispatch } = setup();

  await expect(root.descend("math").descend("subtract").call(42, 23)).resolves.toBe("ok");
  expect(dispatch).toHaveBeenCalledWith("math.subtract", [42, 23], {}, {});
});

test("takes keyword arguments and options from a trailing marker", async () => {
  const { root, dispatch } = setup();
  const path = root.descend("audit").descend("log");

  await path.call(kwargs({ event: "login" }));
  await path.call("login", notification());

  expect(dispatch).toHaveBeenNthCalledWith(1, "audit.log", [], { event: "login" }, {});
  expect(dispatch).toHaveBeenNthCalledWith(2, "audit.log", ["login"], {}, { notification: true });
});

test("rejects private and malformed segments", () => {
  const { root } = setup();

  expect(() => root.descend("_foo")).toThrow(UsageError);
  expect(() => root.descend("foo").descend("bar").descend("_baz")).toThrow(UsageError);
  expect(() => root.descend("a.b")).toThrow(UsageError);
});

test("refuses to call the root", async () => {
  const { root, dispatch } = setup();

  await expect(root.call()).rejects.toThrow(UsageError);
  expect(dispatch).not.toHaveBeenCalled();
});
