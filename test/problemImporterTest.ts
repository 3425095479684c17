import * as path from "path";
import { expect } from "chai";
import { importProblems, parseProblemCsv } from "../src/services/problem-importer";
import { TrainerStore } from "../src/storage/trainer-store";
import { makeTempDir, removeDir, writeFiles } from "./helpers";

describe("problem importer", () => {
  describe("parseProblemCsv", () => {
    it("should read rows regardless of header case and spacing", () => {
      const { rows, skipped } = parseProblemCsv(
        " Contest , TITLE,Body,Id\nabc100,Happy Birthday,Cut the cake,7\narc5, Balance ,,\n"
      );

      expect(skipped).to.deep.equal([]);
      expect(rows).to.deep.equal([
        { contest: "abc100", title: "Happy Birthday", body: "Cut the cake", id: 7 },
        { contest: "arc5", title: "Balance", body: "", id: undefined },
      ]);
    });

    it("should keep quoted commas and line breaks in the body", () => {
      const { rows } = parseProblemCsv('contest,title,body\nabc1,Sum,"Read a, b\nprint a+b"\n');
      expect(rows[0].body).to.equal("Read a, b\nprint a+b");
    });

    it("should skip rows without a contest or title and report them", () => {
      const { rows, skipped } = parseProblemCsv(
        "contest,title,body\n,Orphan,x\nabc1,,y\nabc1,Fine,z\n"
      );

      expect(rows.map((row) => row.title)).to.deep.equal(["Fine"]);
      expect(skipped).to.deep.equal([
        { row: 1, reason: "contest is required" },
        { row: 2, reason: "title is required" },
      ]);
    });

    it("should skip rows whose contest would leave the workspace", () => {
      const { rows, skipped } = parseProblemCsv(
        "contest,title,body\n../..,Escape,x\na/b,Slash,y\n..,Up,z\nc\\d,Back,w\nabc1,Fine,v\n"
      );

      const reason = "contest must be a plain name without path separators";
      expect(rows.map((row) => row.title)).to.deep.equal(["Fine"]);
      expect(skipped).to.deep.equal([
        { row: 1, reason },
        { row: 2, reason },
        { row: 3, reason },
        { row: 4, reason },
      ]);
    });

    it("should skip rows whose id is not a positive whole number", () => {
      const { rows, skipped } = parseProblemCsv("contest,title,id\nabc1,A,zero\nabc1,B,-2\nabc1,C,3\n");

      expect(rows.map((row) => row.id)).to.deep.equal([3]);
      expect(skipped.map((skip) => skip.row)).to.deep.equal([1, 2]);
    });
  });

  describe("importProblems", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it("should save every valid row to the repository", async () => {
      await writeFiles(dir, {
        "problems.csv": "contest,title,body,id\nabc1,A,first,\nabc1,B,second,20\nabc2,,missing,\n",
      });
      const store = new TrainerStore();

      const result = await importProblems(path.join(dir, "problems.csv"), store);

      expect(result.imported.map((p) => p.id)).to.deep.equal([1, 20]);
      expect(result.skipped).to.deep.equal([{ row: 3, reason: "title is required" }]);
      expect(await store.distinctContests()).to.deep.equal(["abc1"]);
      expect((await store.getProblem(20))?.body).to.equal("second");
    });
  });
});
