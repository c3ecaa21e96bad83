import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';

export type TopologyErrorKind = 'validation' | 'invariant_violation';

/** 잘못된 페이로드 또는 참조 무결성 위반. 스토어는 변경되지 않는다. */
export class TopologyValidationError extends BadRequestException {
  readonly kind: TopologyErrorKind = 'validation';
}

/** 존재하지 않는 노드/링크 id. */
export class UnknownEntityError extends NotFoundException {
  readonly kind: TopologyErrorKind = 'validation';

  constructor(entity: 'node' | 'link', id: string) {
    super(`${entity === 'node' ? 'Node' : 'Link'} not found: ${id}`);
  }
}

/** 아직 링크가 참조하고 있는 노드를 지우려 할 때. 연쇄 삭제는 하지 않는다. */
export class NodeInUseError extends ConflictException {
  readonly kind: TopologyErrorKind = 'validation';

  constructor(nodeId: string, linkIds: string[]) {
    super(`Node ${nodeId} is still referenced by link(s): ${linkIds.join(', ')}`);
  }
}

/** 이미 존재하는 id 로 삽입하려는 경우. */
export class DuplicateEntityError extends ConflictException {
  readonly kind: TopologyErrorKind = 'invariant_violation';

  constructor(entity: 'node' | 'link', id: string) {
    super(`${entity === 'node' ? 'Node' : 'Link'} already exists: ${id}`);
  }
}
