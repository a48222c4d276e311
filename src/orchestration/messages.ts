import { ErrorKind } from "../types/contracts";

export type UiLanguage = "th" | "en";

export interface StatusMessages {
  listening: string;
  thinking: string;
  answer: string;
  done: string;
  errors: Record<ErrorKind, string>;
}

const THAI: StatusMessages = {
  listening: "กำลังฟัง… พูดได้เลย",
  thinking: "กำลังคิด…",
  answer: "คำตอบ:",
  done: "เสร็จแล้ว",
  errors: {
    no_microphone: "ไม่พบไมโครโฟน",
    permission_denied: "ไม่ได้รับอนุญาตให้ใช้ไมโครโฟน",
    unintelligible: "ไม่สามารถเข้าใจเสียงได้ — ลองพูดใหม่อีกครั้ง",
    timeout: "หมดเวลา — ลองใหม่อีกครั้ง",
    recognition_failed: "แปลงเสียงเป็นข้อความไม่สำเร็จ",
    unreachable: "ไม่สามารถเชื่อมต่อ OpenClaw ได้ — ตรวจสอบว่าเซิร์ฟเวอร์ทำงานอยู่",
    backend_error: "เซิร์ฟเวอร์ตอบกลับผิดพลาด",
    synthesis_failed: "สร้างเสียงพูดไม่สำเร็จ",
    output_failed: "เล่นเสียงไม่สำเร็จ"
  }
};

const ENGLISH: StatusMessages = {
  listening: "Listening… speak now",
  thinking: "Thinking…",
  answer: "Answer:",
  done: "Done",
  errors: {
    no_microphone: "No microphone found",
    permission_denied: "Microphone access was denied",
    unintelligible: "Could not understand the audio. Please try again.",
    timeout: "Timed out. Please try again.",
    recognition_failed: "Speech recognition failed",
    unreachable: "Cannot reach the assistant backend. Is the server running?",
    backend_error: "The assistant backend returned an error",
    synthesis_failed: "Speech synthesis failed",
    output_failed: "Audio playback failed"
  }
};

export function messagesFor(language: UiLanguage): StatusMessages {
  return language === "en" ? ENGLISH : THAI;
}
