import { NextResponse } from 'next/server';
import { buildLboModel, LboInputError, parseAssumptionsPayload, serializeLboModel } from '@/lib/lbo';

export async function POST(request: Request) {
  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return NextResponse.json({ error: 'Request body must be valid JSON' }, { status: 400 });
    }

    // 1. 유효성 검사
    const assumptions = parseAssumptionsPayload(body);

    // 2. 모델 실행 (동기, 요청 간 공유 상태 없음)
    const model = buildLboModel(assumptions);

    return NextResponse.json({
      status: 'success',
      data: serializeLboModel(model),
    });
  } catch (error) {
    if (error instanceof LboInputError) {
      return NextResponse.json({ error: error.message, issues: error.issues }, { status: 400 });
    }

    console.error('[API/Model/LBO] Error:', error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'Internal Server Error' },
      { status: 500 }
    );
  }
}
