import type { ClassroomRow, CountRow } from "../../types/db";
import type { MembershipDirectory } from "../../types/store";
import { queryAsync } from "./dbHelper";

/**
 * Classroom membership read from the classroom tables.
 * Only accepted memberships count; pending invites do not.
 */
export class MySqlMembershipDirectory implements MembershipDirectory {
  async isMember(classroomId: number, studentId: number): Promise<boolean> {
    const rows = await queryAsync<CountRow>(
      `SELECT COUNT(*) AS cnt
       FROM classroom_members
       WHERE classroom_id = ? AND student_id = ? AND status = 'accepted'`,
      [classroomId, studentId]
    );
    const isMember = Number(rows[0]?.cnt ?? 0) > 0;

    if (process.env.NODE_ENV === "development") {
      console.debug("Classroom membership check:", {
        classroomId,
        studentId,
        isMember,
      });
    }
    return isMember;
  }

  async findTeacherId(classroomId: number): Promise<number | null> {
    const rows = await queryAsync<ClassroomRow>(
      "SELECT id, teacher_id FROM classrooms WHERE id = ? LIMIT 1",
      [classroomId]
    );
    return rows[0]?.teacher_id ?? null;
  }

  async countMembers(classroomId: number): Promise<number> {
    const rows = await queryAsync<CountRow>(
      `SELECT COUNT(*) AS cnt
       FROM classroom_members
       WHERE classroom_id = ? AND status = 'accepted'`,
      [classroomId]
    );
    return Number(rows[0]?.cnt ?? 0);
  }
}
