/**
 * Tests for the testing utilities themselves
 */

import {
  testId,
  resetTestIds,
  createNode,
  createButtonNode,
  createStackNode,
  createTextNode,
  createScreen,
  createJob,
  createJobs,
} from "../testing";

describe("Fixtures", () => {
  beforeEach(() => {
    resetTestIds();
  });

  it("testId should count per process and reset", () => {
    expect(testId()).toBe("node-1");
    expect(testId("job")).toBe("job-2");
    resetTestIds();
    expect(testId()).toBe("node-1");
  });

  it("createNode should fill id and extras", () => {
    expect(createNode("spacer")).toEqual({ id: "spacer-1", type: "spacer", extras: {} });
    expect(createNode("text", { id: "t", text: "Hi" })).toEqual({
      id: "t",
      type: "text",
      text: "Hi",
      extras: {},
    });
  });

  it("createButtonNode should omit an absent actionId", () => {
    expect(createButtonNode("Go")).not.toHaveProperty("actionId");
    expect(createButtonNode("Go", "start").actionId).toBe("start");
  });

  it("createStackNode should keep child order", () => {
    const stack = createStackNode([createTextNode("a"), createTextNode("b")], "hstack");

    expect(stack.type).toBe("hstack");
    expect(stack.children?.map((child) => child.text)).toEqual(["a", "b"]);
  });

  it("createScreen should default to version 1", () => {
    expect(createScreen(createTextNode()).version).toBe(1);
  });

  it("createJob and createJobs should produce distinct pending jobs", () => {
    expect(createJob({ id: "j" })).toEqual({
      id: "j",
      customerName: "Customer j",
      address: "1 Main St",
      status: "pending",
    });
    const jobs = createJobs(3);
    expect(new Set(jobs.map((job) => job.id)).size).toBe(3);
  });
});
