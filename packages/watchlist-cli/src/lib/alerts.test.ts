import { describe, expect, it } from "vitest";
import { applyAlertDefaults, prepareNotification, substituteRootPath, toToastRecord } from "./alerts.js";

describe("applyAlertDefaults", () => {
  it("fills in missing fields", () => {
    expect(applyAlertDefaults({ _ntype: "alert", title: "Added" })).toEqual({
      _ntype: "alert",
      title: "Added",
      type: "info",
      nonblock: true,
      animation: "fade",
      closer: true,
      delay: 5000,
    });
  });

  it("never overwrites fields the producer set", () => {
    const alert = applyAlertDefaults({
      _ntype: "alert",
      type: "error",
      nonblock: false,
      delay: 0,
      hide: false,
    });
    expect(alert.type).toBe("error");
    expect(alert.nonblock).toBe(false);
    expect(alert.delay).toBe(0);
    expect(alert.hide).toBe(false);
    expect(alert.closer).toBe(true);
  });
});

describe("substituteRootPath", () => {
  it("replaces every placeholder, nested values included", () => {
    const out = substituteRootPath(
      {
        _ntype: "alert",
        text: '<a href="{{root}}/shows/1">show</a> and {{root}}/x',
        links: ["{{root}}/a", { href: "{{root}}/b" }],
        count: 3,
      },
      "/watch"
    );
    expect(out).toEqual({
      _ntype: "alert",
      text: '<a href="/watch/shows/1">show</a> and /watch/x',
      links: ["/watch/a", { href: "/watch/b" }],
      count: 3,
    });
  });

  it("leaves the type tag alone", () => {
    expect(substituteRootPath({ _ntype: "{{root}}" }, "/x")._ntype).toBe("{{root}}");
  });
});

describe("prepareNotification", () => {
  it("applies defaults only to alerts", () => {
    expect(prepareNotification({ _ntype: "progress", pct: 10 }, "")).toEqual({
      _ntype: "progress",
      pct: 10,
    });
  });

  it("substitutes after applying defaults", () => {
    const prepared = prepareNotification({ _ntype: "alert", title: "{{root}}" }, "/app");
    expect(prepared.title).toBe("/app");
    expect(prepared.delay).toBe(5000);
  });
});

describe("toToastRecord", () => {
  it("prefixes every field", () => {
    expect(toToastRecord({ _ntype: "alert", title: "T", delay: 5000 })).toEqual({
      pnotify__ntype: "alert",
      pnotify_title: "T",
      pnotify_delay: 5000,
    });
  });
});
