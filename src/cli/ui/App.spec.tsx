/**
 * @file Minimal happy-path spec for the status view components
 */
import { App, StatusView } from "./App";
import { Title, HLine, Hint, Loading } from "./components/ui";

describe("App", () => {
  test("exports function components", () => {
    expect(typeof App).toBe("function");
    expect(typeof StatusView).toBe("function");
    expect(typeof Title).toBe("function");
    expect(typeof HLine).toBe("function");
    expect(typeof Hint).toBe("function");
    expect(typeof Loading).toBe("function");
  });
});
