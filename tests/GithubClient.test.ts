import { getMocks, release } from "./mocks";
const { data, mocks, setData, restoreInitialData } = getMocks();
for (const mock of Object.keys(mocks)) {
  jest.mock(mock, mocks[mock]);
}

import * as githubClient from "../src/github/GithubClient";
import { dashWrap, debugLog } from "../src/github/GithubClient";
import { UploadError } from "../src/release/errors";

function client() {
  return githubClient.getClient(
    { owner: "test-owner", repo: "test-repo" },
    "test-token"
  );
}

describe("Github Client", () => {
  beforeEach(() => {
    restoreInitialData();
  });

  it("authenticates with the given token", () => {
    client();
    expect(data.tokens).toEqual(["test-token"]);
  });

  it("finds a published release by tag", async () => {
    setData({
      releases: [release("v1.0.0", { id: 2 }), release("v1.1.0", { id: 3 })],
    });

    const r = await client().findRelease({ tag: "v1.1.0" });

    expect(r?.id).toBe(3);
    expect(data.calls).toEqual(["getReleaseByTag"]);
  });

  it("finds a draft release", async () => {
    setData({
      releases: [
        release("v9", { id: 1234 }),
        release("v10", { id: 5432, draft: true }),
      ],
    });

    const r = await client().findRelease({ tag: "v10" });

    expect(r?.id).toBe(5432);
    expect(r?.draft).toBe(true);
    expect(data.calls).toEqual(["getReleaseByTag", "listReleases"]);
  });

  it("pages through releases to find a draft", async () => {
    const published = Array.from({ length: 120 }, (_, i) =>
      release(`v1.${i}.0`, { id: i + 1 })
    );
    setData({
      releases: [...published, release("v2.0.0", { id: 999, draft: true })],
    });

    const r = await client().findRelease({ tag: "v2.0.0" });

    expect(r?.id).toBe(999);
    expect(data.releasePages).toEqual([
      { page: 1, per_page: 100 },
      { page: 2, per_page: 100 },
    ]);
  });

  it("ignores drafts with another tag", async () => {
    setData({
      releases: [release("v1", { id: 1, draft: true })],
    });

    const r = await client().findDraftRelease({ tag: "v2" });

    expect(r).toBeUndefined();
  });

  it("returns undefined when no release matches", async () => {
    const r = await client().findRelease({ tag: "v0.0.1" });

    expect(r).toBeUndefined();
  });

  it("fails when the release lookup fails", async () => {
    setData({
      releases: [release("v1")],
      lookupStatus: { status: 500 },
    });

    await expect(client().findRelease({ tag: "v1" })).rejects.toThrow(
      "Server Error"
    );
    expect(data.calls).toEqual(["getReleaseByTag"]);
  });

  it("uploads release assets as raw bytes", async () => {
    const asset = await client().uploadReleaseAsset({
      release: release("v1"),
      assetName: "tool-v1",
      contents: Buffer.from("binary-bytes"),
      contentType: "application/octet-stream",
    });

    expect(asset).toEqual({
      id: 1,
      name: "tool-v1",
      browser_download_url: "https://example.test/download/tool-v1",
    });
    expect(data.uploads).toEqual([
      {
        url: "https://uploads.example.test/releases/1/assets{?name,label}",
        name: "tool-v1",
        contentType: "application/octet-stream",
        contentLength: 12,
        contents: "binary-bytes",
      },
    ]);
  });

  it("wraps upload failures", async () => {
    setData({
      uploadStatus: { status: 422 },
    });

    const upload = client().uploadReleaseAsset({
      release: release("v1"),
      assetName: "tool-v1",
      contents: Buffer.from("x"),
      contentType: "application/octet-stream",
    });

    await expect(upload).rejects.toThrow(UploadError);
    await expect(upload).rejects.toThrow(
      "Failed to upload release asset 'tool-v1': Validation Failed"
    );
  });

  it("dashWrap pads to the line width", () => {
    const wrapped = dashWrap("abc");

    expect(wrapped.length).toBe(80);
    expect(wrapped.startsWith("-")).toBeTruthy();
    expect(wrapped).toContain(" abc ");
  });

  it("debugLog works", () => {
    setData({
      debug: {
        enabled: true,
        log: [],
      },
    });

    debugLog("the_label", "string", { a: 1 });

    expect(data.debug.log).toEqual(["string", '{\n  "a": 1\n}']);
  });

  it("debugLog is silent unless debugging", () => {
    debugLog("the_label", "string");

    expect(data.debug.log).toEqual([]);
  });
});
