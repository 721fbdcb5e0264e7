import os from "node:os";
import path from "node:path";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  defaultSessionDirs,
  listDesktopSessions,
  parseDesktopEntry,
  sessionEnvironment,
  splitExec,
} from "./desktop-sessions.js";

describe("splitExec", () => {
  test("splits on whitespace", () => {
    expect(splitExec("sway --unsupported-gpu")).toEqual(["sway", "--unsupported-gpu"]);
  });

  test("honours double quotes and their escapes", () => {
    expect(splitExec('sh -c "echo \\"hi\\" \\$HOME"')).toEqual(["sh", "-c", 'echo "hi" $HOME']);
    expect(splitExec('run ""')).toEqual(["run", ""]);
  });

  test("drops field codes and keeps literal percent signs", () => {
    expect(splitExec("startplasma-wayland %U --level=100%%")).toEqual([
      "startplasma-wayland",
      "--level=100%",
    ]);
  });

  test("rejects an unterminated quote", () => {
    expect(() => splitExec('sh -c "oops')).toThrow('Unterminated quote in Exec: sh -c "oops');
  });
});

describe("parseDesktopEntry", () => {
  test("reads only the Desktop Entry group and skips localized keys", () => {
    const entry = parseDesktopEntry(
      [
        "# comment",
        "[Desktop Entry]",
        "Name=Sway",
        "Name[de]=Schwanken",
        "Comment=An i3-compatible\\sWayland compositor",
        "Exec=sway",
        "[Desktop Action debug]",
        "Exec=sway -d",
      ].join("\n")
    );
    expect(Object.fromEntries(entry)).toEqual({
      Name: "Sway",
      Comment: "An i3-compatible Wayland compositor",
      Exec: "sway",
    });
  });
});

describe("listDesktopSessions", () => {
  let root: string;
  let waylandDir: string;
  let xDir: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "porch-sessions-"));
    waylandDir = path.join(root, "wayland-sessions");
    xDir = path.join(root, "xsessions");
    await mkdir(waylandDir);
    await mkdir(xDir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("lists sessions in directory then file-name order", async () => {
    await writeFile(
      path.join(waylandDir, "sway.desktop"),
      "[Desktop Entry]\nName=Sway\nExec=sway\nType=Application\n"
    );
    await writeFile(
      path.join(waylandDir, "hyprland.desktop"),
      "[Desktop Entry]\nName=Hyprland\nComment=Dynamic tiling\nExec=Hyprland\n"
    );
    await writeFile(path.join(xDir, "i3.desktop"), "[Desktop Entry]\nName=i3\nExec=i3\n");
    await writeFile(path.join(xDir, "README"), "not a session");

    const sessions = await listDesktopSessions({ dirs: [waylandDir, xDir] });

    expect(sessions).toEqual([
      {
        id: "hyprland",
        name: "Hyprland",
        comment: "Dynamic tiling",
        command: ["Hyprland"],
        sessionType: "wayland",
        path: path.join(waylandDir, "hyprland.desktop"),
      },
      {
        id: "sway",
        name: "Sway",
        comment: null,
        command: ["sway"],
        sessionType: "wayland",
        path: path.join(waylandDir, "sway.desktop"),
      },
      {
        id: "i3",
        name: "i3",
        comment: null,
        command: ["i3"],
        sessionType: "x11",
        path: path.join(xDir, "i3.desktop"),
      },
    ]);
  });

  test("lets an earlier directory shadow or hide a later entry", async () => {
    await writeFile(path.join(waylandDir, "gnome.desktop"), "[Desktop Entry]\nName=GNOME\nExec=gnome-session\n");
    await writeFile(path.join(xDir, "gnome.desktop"), "[Desktop Entry]\nName=GNOME on Xorg\nExec=gnome-session\n");
    await writeFile(path.join(waylandDir, "kiosk.desktop"), "[Desktop Entry]\nName=Kiosk\nExec=cage\nHidden=true\n");
    await writeFile(path.join(xDir, "kiosk.desktop"), "[Desktop Entry]\nName=Kiosk\nExec=cage\n");

    const sessions = await listDesktopSessions({ dirs: [waylandDir, xDir] });
    expect(sessions.map((session) => [session.id, session.name, session.sessionType])).toEqual([
      ["gnome", "GNOME", "wayland"],
    ]);
  });

  test("skips hidden, non-application and broken entries", async () => {
    await writeFile(path.join(xDir, "a.desktop"), "[Desktop Entry]\nName=A\nExec=a\nNoDisplay=true\n");
    await writeFile(path.join(xDir, "b.desktop"), "[Desktop Entry]\nName=B\nExec=b\nType=Link\n");
    await writeFile(path.join(xDir, "c.desktop"), "[Desktop Entry]\nName=C\n");
    await writeFile(path.join(xDir, "d.desktop"), '[Desktop Entry]\nName=D\nExec=d "\n');
    await writeFile(path.join(xDir, "e.desktop"), "[Desktop Entry]\nExec=e %f\n");

    const sessions = await listDesktopSessions({ dirs: [xDir] });
    expect(sessions.map((session) => [session.id, session.name, session.command])).toEqual([
      ["e", "e", ["e"]],
    ]);
  });

  test("ignores directories that do not exist", async () => {
    await writeFile(path.join(xDir, "i3.desktop"), "[Desktop Entry]\nName=i3\nExec=i3\n");
    const sessions = await listDesktopSessions({ dirs: [path.join(root, "missing"), xDir] });
    expect(sessions.map((session) => session.id)).toEqual(["i3"]);
  });
});

describe("session helpers", () => {
  test("defaultSessionDirs lists wayland directories before X11 ones", () => {
    expect(defaultSessionDirs({ XDG_DATA_DIRS: "/a:/b" })).toEqual([
      "/a/wayland-sessions",
      "/b/wayland-sessions",
      "/a/xsessions",
      "/b/xsessions",
    ]);
  });

  test("sessionEnvironment names the session type and desktop", () => {
    const env = sessionEnvironment(
      {
        id: "sway",
        name: "Sway",
        comment: null,
        command: ["sway"],
        sessionType: "wayland",
        path: "/usr/share/wayland-sessions/sway.desktop",
      },
      ["LANG=C.UTF-8"]
    );
    expect(env).toEqual(["XDG_SESSION_TYPE=wayland", "XDG_SESSION_DESKTOP=sway", "LANG=C.UTF-8"]);
  });
});
