import { allOf, anyOf, createSnapshot, LeafMatch, WindowEnumerator } from "../src";
import { SnapshotListSource } from "../tooling/lib";

const source = new SnapshotListSource();
source.add(createSnapshot({ handle: 1, title: "Untitled - Notepad", className: "Notepad", executable: "notepad.exe", processId: 410 }));
source.add(createSnapshot({ handle: 2, title: "Inbox - Mail", className: "ApplicationFrameWindow", executable: "mail.exe", processId: 522 }));
source.add(createSnapshot({ handle: 3, title: "Chrome Browser", className: "Chrome_WidgetWin_1", executable: "chrome.exe", processId: 733 }));
source.add(createSnapshot({ handle: 4, title: "", className: "Chrome_WidgetWin_0", executable: "chrome.exe", processId: 733 }), false);
source.setActive(3);

const editors = anyOf(
  new LeafMatch({ title: "Notepad" }, "partial"),
  new LeafMatch({ executable: "^chrome\\.exe$" })
);
editors.addBlacklist(new LeafMatch({ title: "^$" }));

const enumerator = new WindowEnumerator(source);

enumerator.forAll(editors, (record) => {
  console.log("match", record.snapshot.handle, record.snapshot.title);
});

const chromeWindows = allOf(new LeafMatch({ executable: "chrome" }, "partial"), new LeafMatch({ processId: 733 }));
const visitedAll = enumerator.forAllWhile(chromeWindows, (record) => record.snapshot.title !== "", "all");
console.log("visited every chrome window:", visitedAll);

console.log("active window is an editor:", editors.isActive(source));
console.log("leaves:", editors.asList().map((leaf) => leaf.criteria));
console.log("reversed matches notepad:", editors.asReverse().match(source.all()[0].snapshot));
